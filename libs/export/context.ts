import path from 'path';
import type { ExportResult } from './result.js';

/**
 * Export Context
 *
 * Per-record run state handed to every destination of one export run.
 * `previousResults` accumulates in execution order, so a destination can
 * look up what higher-priority destinations produced before it ran
 * (e.g. embed the CDCS record URL in a notebook entry).
 *
 * A context belongs to exactly one run and is discarded once its results
 * are persisted.
 */

export interface ExportContextInit {
    readonly filePath: string;
    readonly sessionIdentifier: string;
    readonly instrumentPid: string;
    readonly timeRangeStart: Date;
    readonly timeRangeEnd: Date;
    readonly user?: string | null;
    readonly metadata?: Record<string, unknown>;
}

export class ExportContext {
    readonly filePath: string;
    readonly sessionIdentifier: string;
    readonly instrumentPid: string;
    readonly timeRangeStart: Date;
    readonly timeRangeEnd: Date;
    readonly user: string | null;
    readonly metadata: Readonly<Record<string, unknown>>;

    private readonly results = new Map<string, ExportResult>();

    constructor(init: ExportContextInit) {
        this.filePath = init.filePath;
        this.sessionIdentifier = init.sessionIdentifier;
        this.instrumentPid = init.instrumentPid;
        this.timeRangeStart = init.timeRangeStart;
        this.timeRangeEnd = init.timeRangeEnd;
        this.user = init.user ?? null;
        this.metadata = Object.freeze({ ...(init.metadata ?? {}) });
    }

    /**
     * Snapshot of the results recorded so far, keyed by destination name, in
     * execution order. Changes to the returned map do not reach the context.
     */
    get previousResults(): ReadonlyMap<string, ExportResult> {
        return new Map(this.results);
    }

    getResult(destinationName: string): ExportResult | undefined {
        return this.results.get(destinationName);
    }

    /**
     * Records a destination's result. Entries are never removed; recording
     * the same name twice replaces the value but keeps its original position.
     */
    addResult(destinationName: string, result: ExportResult): void {
        this.results.set(destinationName, result);
    }

    hasSuccessfulExport(destinationName: string): boolean {
        return this.results.get(destinationName)?.success === true;
    }

    /**
     * Record URL of a destination that already ran and succeeded.
     */
    successfulRecordUrl(destinationName: string): string | undefined {
        const result = this.results.get(destinationName);
        return result?.success ? result.recordUrl : undefined;
    }

    resultsInOrder(): ExportResult[] {
        return [...this.results.values()];
    }

    /** File name without directory or extension, used as a record title. */
    get recordTitle(): string {
        return path.parse(this.filePath).name;
    }
}
