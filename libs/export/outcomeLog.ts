/**
 * Outcome Log Model
 *
 * Durable, append-only audit of export attempts: one row per
 * (session, destination, attempt). Rows are inserted, never updated or
 * deleted; a re-export of the same session adds new rows.
 */

import type { ExportResult } from './result.js';

export interface OutcomeLogEntry {
    /** Assigned by the store */
    readonly id: number;
    readonly sessionIdentifier: string;
    readonly destinationName: string;
    readonly success: boolean;
    readonly recordId: string | null;
    readonly recordUrl: string | null;
    readonly errorMessage: string | null;
    readonly timestamp: Date;
    /** JSON text of the result metadata; null when the metadata was empty */
    readonly metadataJson: string | null;
}

export type NewOutcomeLogEntry = Omit<OutcomeLogEntry, 'id'>;

export interface OutcomeLog {
    /**
     * Persists every result of one export run, tagged with the session.
     * Rejects when the write fails; nothing is retried here.
     */
    append(sessionIdentifier: string, results: readonly ExportResult[]): Promise<void>;
    findBySession(sessionIdentifier: string): Promise<readonly OutcomeLogEntry[]>;
}

export function serializeMetadata(metadata: Readonly<Record<string, unknown>>): string | null {
    return Object.keys(metadata).length > 0 ? JSON.stringify(metadata) : null;
}

export function toOutcomeLogEntry(sessionIdentifier: string, result: ExportResult): NewOutcomeLogEntry {
    return {
        sessionIdentifier,
        destinationName: result.destinationName,
        success: result.success,
        recordId: result.recordId ?? null,
        recordUrl: result.recordUrl ?? null,
        errorMessage: result.errorMessage ?? null,
        timestamp: result.timestamp,
        metadataJson: serializeMetadata(result.metadata)
    };
}

/**
 * Process-local Outcome Log for dry runs and tests.
 */
export class InMemoryOutcomeLog implements OutcomeLog {
    private readonly rows: OutcomeLogEntry[] = [];
    private nextId = 1;

    async append(sessionIdentifier: string, results: readonly ExportResult[]): Promise<void> {
        for (const result of results) {
            this.rows.push(Object.freeze({ id: this.nextId++, ...toOutcomeLogEntry(sessionIdentifier, result) }));
        }
    }

    async findBySession(sessionIdentifier: string): Promise<readonly OutcomeLogEntry[]> {
        return this.rows.filter(row => row.sessionIdentifier === sessionIdentifier);
    }

    get entries(): readonly OutcomeLogEntry[] {
        return [...this.rows];
    }
}
