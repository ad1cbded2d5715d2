/**
 * Drift Error Taxonomy
 *
 * Every failure the engine distinguishes has its own class so callers can
 * branch on `instanceof` (or `code`) instead of matching message text.
 * Only ConfigurationError is allowed to abort a run.
 */

export type DriftErrorCode =
    | 'MALFORMED_ADDRESS'
    | 'RENDER_TIMEOUT'
    | 'RENDER_ERROR'
    | 'ORACLE_UNAVAILABLE'
    | 'ORACLE_MALFORMED_RESPONSE'
    | 'CONFIGURATION_ERROR';

export class DriftError extends Error {
    readonly code: DriftErrorCode;

    readonly details?: Record<string, unknown>;

    constructor(message: string, code: DriftErrorCode, details?: Record<string, unknown>) {
        super(message);
        this.name = 'DriftError';
        this.code = code;
        this.details = details;
    }
}

export class MalformedAddressError extends DriftError {
    constructor(address: string, reason: string) {
        super(`Malformed address "${address}": ${reason}`, 'MALFORMED_ADDRESS', { address });
        this.name = 'MalformedAddressError';
    }
}

export class RenderTimeoutError extends DriftError {
    constructor(address: string, timeoutMs: number) {
        super(`Timed out after ${timeoutMs}ms rendering ${address}`, 'RENDER_TIMEOUT', { address, timeoutMs });
        this.name = 'RenderTimeoutError';
    }
}

export class RenderError extends DriftError {
    constructor(address: string, cause: string) {
        super(`Failed to render ${address}: ${cause}`, 'RENDER_ERROR', { address });
        this.name = 'RenderError';
    }
}

export class OracleUnavailableError extends DriftError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'ORACLE_UNAVAILABLE', details);
        this.name = 'OracleUnavailableError';
    }
}

export class OracleMalformedResponseError extends DriftError {
    constructor(message: string, raw?: string) {
        super(message, 'ORACLE_MALFORMED_RESPONSE', raw === undefined ? undefined : { raw });
        this.name = 'OracleMalformedResponseError';
    }
}

export class ConfigurationError extends DriftError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

export function isRetryableOracleError(error: unknown): boolean {
    return error instanceof OracleUnavailableError || error instanceof OracleMalformedResponseError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
