import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

export class ValidationError extends Error {
    constructor(
        public readonly context: string,
        public readonly issues: readonly ValidationIssue[]
    ) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'ValidationError';
    }
}

/**
 * Parses `data` against `schema`, throwing a ValidationError on failure.
 * Only issue paths and messages are logged, never the offending values.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input validation failure");

        throw new ValidationError(context, errorDetails);
    }

    return result.data;
}

/**
 * Factory for creating reusable validators bound to one schema.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
