/**
 * JSON Validator
 *
 * Safe JSON parsing plus lightweight type-guard validators, used at the
 * oracle boundary so untyped model output never travels further inward.
 */

import { ErrorHandler, ErrorSeverity, ErrorContext } from './ErrorHandler.js';

/**
 * Simple type validator function
 */
export type Validator<T> = (value: unknown) => value is T;

export interface ValidationResult<T> {
    success: boolean;
    data?: T;
    error?: string;
}

/**
 * Built-in validators for common types
 */
export const Validators = {
    string: (value: unknown): value is string => typeof value === 'string',
    nonEmptyString: (value: unknown): value is string => typeof value === 'string' && value.trim().length > 0,
    array: <T>(itemValidator?: Validator<T>) => (value: unknown): value is T[] => {
        if (!Array.isArray(value)) return false;
        if (itemValidator) {
            return value.every(item => itemValidator(item));
        }
        return true;
    },
    object: (value: unknown): value is Record<string, unknown> =>
        typeof value === 'object' && value !== null && !Array.isArray(value),
};

/**
 * Create a validator for an object shape
 */
export function createObjectValidator<T extends object>(
    shape: { [K in keyof T]: Validator<T[K]> }
): Validator<T> {
    return (value: unknown): value is T => {
        if (!Validators.object(value)) return false;
        for (const key in shape) {
            if (!shape[key](value[key])) return false;
        }
        return true;
    };
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/;

export class JsonValidator {
    /**
     * Parse JSON string safely
     */
    static parse<T>(
        jsonString: string,
        context: string,
        validator: Validator<T>
    ): ValidationResult<T> {
        const errorContext: ErrorContext = {
            component: 'JsonValidator',
            operation: 'parse',
            data: { context }
        };

        try {
            const parsed: unknown = JSON.parse(jsonString);

            if (!validator(parsed)) {
                return {
                    success: false,
                    error: 'Validation failed: data does not match expected shape'
                };
            }

            return { success: true, data: parsed };
        } catch (error) {
            const err = ErrorHandler.handle(error, errorContext, ErrorSeverity.SILENT);
            return { success: false, error: err.message };
        }
    }

    /**
     * Pull a JSON document out of model text: the whole string, or the
     * first fenced block when the text is wrapped in markdown.
     */
    static extract<T>(text: string, validator: Validator<T>): ValidationResult<T> {
        const direct = this.parse<T>(text.trim(), 'extract', validator);
        if (direct.success) return direct;

        const fenced = text.match(FENCED_BLOCK);
        if (fenced) {
            return this.parse<T>(fenced[1], 'extract.fenced', validator);
        }
        return direct;
    }
}
