/**
 * Programmer errors raised by the export subsystem before any destination
 * runs. Destination failures are never errors: they are ExportResults.
 */
export class ExportPreconditionError extends Error {
    readonly code: string;

    constructor(code: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ExportPreconditionError';
        this.code = code;
    }
}

export class UnknownStrategyError extends ExportPreconditionError {
    constructor(readonly strategy: string) {
        super('UNKNOWN_STRATEGY', `Unknown export strategy: ${strategy}`);
        this.name = 'UnknownStrategyError';
    }
}
