/**
 * DriftOracleClient
 *
 * Calls the vision oracle for one pair. OracleUnavailable and
 * OracleMalformedResponse are retried with exponential backoff; when the
 * retries run out the pair is downgraded to `analysis-failed` instead of
 * failing the run.
 */

import { errorMessage, isRetryableOracleError } from '../../shared/errors.js';
import { DRIFT_DEFAULTS } from '../config/constants.js';
import type { Oracle, OracleContext, PairOutcome } from '../types.js';

export interface DriftOracleClientOptions {
    oracle: Oracle;
    /** Retries after the first attempt */
    retries?: number;
    backoffMs?: number;
    sleep?: (ms: number) => Promise<void>;
    log?: (msg: string) => void;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export class DriftOracleClient {
    private readonly oracle: Oracle;
    private readonly retries: number;
    private readonly backoffMs: number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly log: (msg: string) => void;

    constructor(options: DriftOracleClientOptions) {
        this.oracle = options.oracle;
        this.retries = options.retries ?? DRIFT_DEFAULTS.ORACLE_RETRIES;
        this.backoffMs = options.backoffMs ?? DRIFT_DEFAULTS.ORACLE_BACKOFF_MS;
        this.sleep = options.sleep ?? defaultSleep;
        this.log = options.log ?? ((msg) => console.warn(msg));
    }

    async compare(source: Buffer, target: Buffer, context: OracleContext): Promise<PairOutcome> {
        const label = `${context.artifactName} [${context.targetLocale}]`;
        let lastError = '';
        let attempts = 0;

        for (let attempt = 0; attempt <= this.retries; attempt++) {
            attempts++;
            try {
                const findings = await this.oracle.compare(source, target, context);
                return { status: 'analyzed', findings };
            } catch (error) {
                lastError = errorMessage(error);
                if (!isRetryableOracleError(error)) break;

                if (attempt < this.retries) {
                    const delay = this.backoffMs * 2 ** attempt;
                    this.log(`[DriftOracleClient] ${label}: ${lastError}; retry ${attempt + 1}/${this.retries} in ${delay}ms`);
                    await this.sleep(delay);
                }
            }
        }

        return { status: 'analysis-failed', reason: `${lastError} (gave up after ${attempts} attempt(s))` };
    }
}
