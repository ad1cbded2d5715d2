/**
 * Device-run directory names follow `<model>-<platformVersion>-<locale>-<orientation>`.
 * Exactly four non-empty tokens; a model or orientation that itself contains
 * the delimiter cannot be represented and is rejected.
 */

import { NAMING } from '../config/constants.js';
import type { RunGroupKey } from '../types.js';

export interface ParsedRunName {
    ok: true;
    name: string;
    model: string;
    platformVersion: string;
    locale: string;
    orientation: string;
    groupKey: RunGroupKey;
}

export interface ParseFailure {
    ok: false;
    name: string;
    reason: string;
}

export function parseRunName(name: string): ParsedRunName | ParseFailure {
    const tokens = name.split(NAMING.RUN_NAME_DELIMITER);
    if (tokens.length !== NAMING.RUN_NAME_TOKENS) {
        return {
            ok: false,
            name,
            reason: `expected ${NAMING.RUN_NAME_TOKENS} "${NAMING.RUN_NAME_DELIMITER}"-delimited fields, got ${tokens.length}`
        };
    }
    if (tokens.some(token => token.length === 0)) {
        return { ok: false, name, reason: 'empty field' };
    }

    const [model, platformVersion, locale, orientation] = tokens;
    return {
        ok: true,
        name,
        model,
        platformVersion,
        locale,
        orientation,
        groupKey: formatGroupKey(model, platformVersion, orientation)
    };
}

function formatGroupKey(model: string, platformVersion: string, orientation: string): RunGroupKey {
    return [model, platformVersion, orientation].join(NAMING.RUN_NAME_DELIMITER);
}

export function formatRunName(groupKey: RunGroupKey, locale: string): string | null {
    const parts = groupKey.split(NAMING.RUN_NAME_DELIMITER);
    if (parts.length !== NAMING.RUN_NAME_TOKENS - 1 || parts.some(p => p.length === 0)) return null;

    parts.splice(NAMING.RUN_NAME_LOCALE_INDEX, 0, locale);
    return parts.join(NAMING.RUN_NAME_DELIMITER);
}
