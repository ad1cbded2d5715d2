/**
 * Centralized Error Handler
 *
 * Severity-based reporting for the failures the drift engine contains
 * (render failures, rejected run directories, unreadable paths), plus one
 * exit for the setup failures it does not.
 */

import { DriftError, errorMessage, type DriftErrorCode } from '../errors.js';

export enum ErrorSeverity {
    /** Not logged; the caller falls back on its own */
    SILENT = 'silent',
    /** One warning line; the failed unit is recorded and the run goes on */
    WARNING = 'warning',
    /** Error line plus the context data */
    ERROR = 'error',
    /** Context data is logged, then the error is re-thrown for the caller to report */
    CRITICAL = 'critical'
}

export interface ErrorContext {
    /** Component or function name */
    component: string;
    operation?: string;
    data?: Record<string, unknown>;
}

export interface HandledError {
    message: string;
    code?: DriftErrorCode;
    context: ErrorContext;
}

function tag(ctx: ErrorContext): string {
    return ctx.operation ? `[${ctx.component}.${ctx.operation}]` : `[${ctx.component}]`;
}

export class ErrorHandler {
    /**
     * Report `error` at `severity` and describe it. CRITICAL never returns.
     */
    static handle(
        error: unknown,
        context: ErrorContext,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): HandledError {
        if (severity === ErrorSeverity.CRITICAL) {
            this.critical(error, context);
        }

        const handled: HandledError = {
            message: errorMessage(error),
            code: error instanceof DriftError ? error.code : undefined,
            context
        };

        if (severity === ErrorSeverity.WARNING) {
            console.warn(`${tag(context)} Warning: ${handled.message}`);
        } else if (severity === ErrorSeverity.ERROR) {
            console.error(`${tag(context)} Error: ${handled.message}`);
            if (context.data) console.error(`${tag(context)} Context:`, context.data);
        }
        return handled;
    }

    /** Log the context of a setup failure and re-throw it. */
    static critical(error: unknown, context: ErrorContext): never {
        if (context.data) console.error(`${tag(context)} Context:`, context.data);
        throw error instanceof Error ? error : new Error(String(error));
    }

    /**
     * Run `fn`; on failure report at `severity` and return `fallback`.
     */
    static async safeExecute<T>(
        fn: () => Promise<T>,
        context: ErrorContext,
        fallback: T,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            this.handle(error, context, severity);
            return fallback;
        }
    }

    static safeExecuteSync<T>(
        fn: () => T,
        context: ErrorContext,
        fallback: T,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): T {
        try {
            return fn();
        } catch (error) {
            this.handle(error, context, severity);
            return fallback;
        }
    }
}
