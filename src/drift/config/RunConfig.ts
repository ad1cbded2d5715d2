/**
 * Run configuration: environment defaults and validation.
 */

import { ConfigurationError } from '../../shared/errors.js';
import type { LocaleSet } from '../types.js';
import { DRIFT_DEFAULTS } from './constants.js';

export interface RunConfig {
    locales: LocaleSet;
    /** Worker-pool width for renders and oracle calls */
    concurrency: number;
    maxPages: number;
    /** Oracle retries after the first attempt */
    retries: number;
    backoffMs: number;
    renderTimeoutMs: number;
}

export interface EnvDefaults {
    apiKey: string;
    model: string;
    concurrency: number;
    maxPages: number;
    retries: number;
    backoffMs: number;
    renderTimeoutMs: number;
}

/**
 * Read LOCALE_DRIFT_* and GEMINI_API_KEY. Unset variables fall back to
 * DRIFT_DEFAULTS; set but non-numeric values are a ConfigurationError.
 */
export function readEnvDefaults(env: NodeJS.ProcessEnv = process.env): EnvDefaults {
    return {
        apiKey: env.GEMINI_API_KEY ?? '',
        model: env.LOCALE_DRIFT_MODEL || DRIFT_DEFAULTS.MODEL,
        concurrency: envInteger(env, 'LOCALE_DRIFT_CONCURRENCY', DRIFT_DEFAULTS.CONCURRENCY),
        maxPages: envInteger(env, 'LOCALE_DRIFT_MAX_PAGES', DRIFT_DEFAULTS.MAX_PAGES),
        retries: envInteger(env, 'LOCALE_DRIFT_RETRIES', DRIFT_DEFAULTS.ORACLE_RETRIES),
        backoffMs: envInteger(env, 'LOCALE_DRIFT_BACKOFF_MS', DRIFT_DEFAULTS.ORACLE_BACKOFF_MS),
        renderTimeoutMs: envInteger(env, 'LOCALE_DRIFT_TIMEOUT_MS', DRIFT_DEFAULTS.RENDER_TIMEOUT_MS)
    };
}

export function parseInteger(value: string, label: string): number {
    const trimmed = value.trim();
    if (!/^-?\d+$/.test(trimmed)) {
        throw new ConfigurationError(`${label} must be an integer, got "${value}"`);
    }
    return Number.parseInt(trimmed, 10);
}

function envInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    return raw === undefined || raw === '' ? fallback : parseInteger(raw, name);
}

/**
 * Reject configurations the pipeline cannot run. Returns the config unchanged.
 */
export function validateRunConfig(config: RunConfig): RunConfig {
    const { sourceLocale, targetLocales } = config.locales;

    if (!sourceLocale.trim()) {
        throw new ConfigurationError('A source locale is required');
    }
    if (targetLocales.length === 0) {
        throw new ConfigurationError('At least one target locale is required');
    }
    const seen = new Set<string>();
    for (const locale of targetLocales) {
        if (!locale.trim()) throw new ConfigurationError('Target locales must not be empty');
        if (locale === sourceLocale) {
            throw new ConfigurationError(`Target locale "${locale}" is the source locale`);
        }
        if (seen.has(locale)) throw new ConfigurationError(`Target locale "${locale}" is listed twice`);
        seen.add(locale);
    }

    requireInteger(config.concurrency, 'concurrency', 1);
    requireInteger(config.maxPages, 'maxPages', 1);
    requireInteger(config.retries, 'retries', 0);
    requireInteger(config.backoffMs, 'backoffMs', 0);
    requireInteger(config.renderTimeoutMs, 'renderTimeoutMs', 1);

    return config;
}

function requireInteger(value: number, label: string, min: number): void {
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigurationError(`${label} must be an integer >= ${min}, got ${value}`);
    }
}
