import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Wraps internal failures (database, filesystem) in an error that carries an
 * incident id for log correlation. The internal details are logged once, on
 * construction, and never surface in the public message.
 */

export class ExportSystemError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: 'PERSIST' | 'CONFIG' | 'OPS' = 'OPS',
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage);
        this.name = 'ExportSystemError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.sqlState = options?.sqlState;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

interface ErrorParts {
    message: string;
    stack?: string;
    code?: string;
}

function stringField(value: object, key: string): string | undefined {
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'string' ? field : undefined;
}

function decompose(err: unknown): ErrorParts {
    if (err instanceof Error) {
        return {
            message: err.message,
            stack: err.stack,
            code: stringField(err, 'code')
        };
    }
    if (typeof err === 'string') {
        return { message: err };
    }
    if (err && typeof err === 'object' && 'message' in err) {
        return {
            message: typeof err.message === 'string' ? err.message : String(err.message),
            stack: stringField(err, 'stack'),
            code: stringField(err, 'code')
        };
    }
    return { message: String(err) };
}

/**
 * Best-effort human readable message for any thrown value.
 * Destinations use this to fill ExportResult.errorMessage.
 */
export function extractErrorMessage(err: unknown): string {
    const { message } = decompose(err);
    return message === '' ? 'Unknown error' : message;
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized ExportSystemError.
     */
    sanitize: (
        err: unknown,
        contextLabel: string,
        category: ExportSystemError['category'] = 'OPS'
    ): ExportSystemError => {
        if (err instanceof ExportSystemError) return err;

        const parts = decompose(err);

        return new ExportSystemError(
            `An internal system error occurred (${contextLabel})`,
            { originalError: parts.message, stack: parts.stack, context: contextLabel },
            category,
            { cause: err, contextLabel, sqlState: parts.code }
        );
    }
};
