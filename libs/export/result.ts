/**
 * Export Result Model
 *
 * Outcome of one destination attempt. Results are frozen on creation and
 * discriminated on `success`: a success may carry a record id and URL, a
 * failure always carries an error message.
 */

export type ResultMetadata = Readonly<Record<string, unknown>>;

interface ExportResultBase {
    /** Name of the destination that produced this result */
    readonly destinationName: string;
    /** When the attempt finished */
    readonly timestamp: Date;
    /** Destination-specific facts (e.g. whether a cross-link was embedded) */
    readonly metadata: ResultMetadata;
}

export interface SuccessfulExportResult extends ExportResultBase {
    readonly success: true;
    /** Destination-assigned identifier */
    readonly recordId?: string;
    /** Direct link to the exported artifact */
    readonly recordUrl?: string;
    readonly errorMessage?: undefined;
}

export interface FailedExportResult extends ExportResultBase {
    readonly success: false;
    readonly recordId?: undefined;
    readonly recordUrl?: undefined;
    readonly errorMessage: string;
}

export type ExportResult = SuccessfulExportResult | FailedExportResult;

export interface SuccessResultInput {
    readonly recordId?: string;
    readonly recordUrl?: string;
    readonly timestamp?: Date;
    readonly metadata?: Record<string, unknown>;
}

export interface FailureResultInput {
    readonly timestamp?: Date;
    readonly metadata?: Record<string, unknown>;
}

function freezeMetadata(metadata: Record<string, unknown> | undefined): ResultMetadata {
    return Object.freeze({ ...(metadata ?? {}) });
}

export function createSuccessResult(
    destinationName: string,
    input: SuccessResultInput = {}
): SuccessfulExportResult {
    return Object.freeze({
        success: true as const,
        destinationName,
        ...(input.recordId !== undefined ? { recordId: input.recordId } : {}),
        ...(input.recordUrl !== undefined ? { recordUrl: input.recordUrl } : {}),
        timestamp: input.timestamp ?? new Date(),
        metadata: freezeMetadata(input.metadata)
    });
}

export function createFailureResult(
    destinationName: string,
    errorMessage: string,
    input: FailureResultInput = {}
): FailedExportResult {
    return Object.freeze({
        success: false as const,
        destinationName,
        errorMessage: errorMessage === '' ? 'Unknown error' : errorMessage,
        timestamp: input.timestamp ?? new Date(),
        metadata: freezeMetadata(input.metadata)
    });
}

export function describeResult(result: ExportResult): string {
    const status = result.success ? 'SUCCESS' : 'FAILED';
    return `ExportResult(destination=${result.destinationName}, status=${status}, recordId=${result.recordId ?? 'none'})`;
}

export function countSuccesses(results: readonly ExportResult[]): number {
    return results.filter(result => result.success).length;
}
