/**
 * Export Orchestrator
 *
 * Entry point called once records are built: for each (file, session)
 * pair it builds a fresh context, dispatches to the enabled destinations
 * under the configured strategy, persists every result to the Outcome Log
 * and collects the results per file.
 *
 * Pairs are processed strictly in input order, one at a time.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../logging/logger.js';
import { ValidationError, validate } from '../validation/zod-middleware.js';
import { ExportContext } from './context.js';
import { ExportPreconditionError } from './errors.js';
import type { OutcomeLog } from './outcomeLog.js';
import type { DestinationRegistry } from './registry.js';
import { countSuccesses, type ExportResult } from './result.js';
import { SessionDescriptorSchema, type SessionDescriptor } from './session.js';
import { assertExportStrategy, isBatchSuccessful, type ExportStrategy } from './strategies.js';

export type ExportResultsByFile = Map<string, readonly ExportResult[]>;

export interface ExportOrchestratorOptions {
    readonly registry: DestinationRegistry;
    readonly outcomeLog: OutcomeLog;
    /** Strategy name, read on every exportRecords call */
    readonly strategy: () => string;
    readonly logger?: Logger;
}

export class ExportOrchestrator {
    private readonly registry: DestinationRegistry;
    private readonly outcomeLog: OutcomeLog;
    private readonly strategy: () => string;
    private readonly log: Logger;

    constructor(options: ExportOrchestratorOptions) {
        this.registry = options.registry;
        this.outcomeLog = options.outcomeLog;
        this.strategy = options.strategy;
        this.log = (options.logger ?? rootLogger).child({ component: 'ExportOrchestrator' });
    }

    /**
     * Exports each file with its session to every enabled destination.
     *
     * @param filePaths record files, parallel to `sessions`
     * @param sessions session descriptors, same length and order as `filePaths`
     * @returns results per file, one entry per destination attempted
     * @throws ExportPreconditionError on mismatched or malformed input, before anything is dispatched
     */
    async exportRecords(
        filePaths: readonly string[],
        sessions: readonly SessionDescriptor[]
    ): Promise<ExportResultsByFile> {
        if (filePaths.length !== sessions.length) {
            throw new ExportPreconditionError(
                'LENGTH_MISMATCH',
                `filePaths (${filePaths.length}) and sessions (${sessions.length}) must have the same length`
            );
        }

        const validSessions = sessions.map((session, index) => this.validateSession(session, index));
        const strategy = assertExportStrategy(this.strategy());

        this.log.info({ count: filePaths.length, strategy }, `Exporting ${filePaths.length} record(s) using strategy: ${strategy}`);

        const results: ExportResultsByFile = new Map();

        for (let index = 0; index < filePaths.length; index++) {
            const filePath = filePaths[index];
            const session = validSessions[index];
            if (filePath === undefined || session === undefined) {
                continue;
            }

            const context = new ExportContext({
                filePath,
                sessionIdentifier: session.sessionIdentifier,
                instrumentPid: session.instrumentPid,
                timeRangeStart: session.timeRangeStart,
                timeRangeEnd: session.timeRangeEnd,
                user: session.user,
                metadata: session.metadata
            });

            this.log.info({ filePath, sessionIdentifier: session.sessionIdentifier }, 'Exporting record');
            const exportResults = await this.registry.exportToAll(context, strategy);

            await this.outcomeLog.append(session.sessionIdentifier, exportResults);
            results.set(filePath, exportResults);

            this.logSummary(filePath, strategy, exportResults);
        }

        return results;
    }

    private validateSession(session: SessionDescriptor, index: number): SessionDescriptor {
        try {
            return validate(SessionDescriptorSchema, session, `ExportOrchestrator:Session[${index}]`);
        } catch (error) {
            if (error instanceof ValidationError) {
                throw new ExportPreconditionError('INVALID_SESSION', error.message, { cause: error });
            }
            throw error;
        }
    }

    private logSummary(filePath: string, strategy: ExportStrategy, results: readonly ExportResult[]): void {
        const succeeded = countSuccesses(results);
        const summary = { filePath, succeeded, attempted: results.length, strategy };

        if (results.length === 0) {
            this.log.warn(summary, 'No export destinations enabled; record was not exported');
        } else if (isBatchSuccessful(strategy, results)) {
            this.log.info(summary, `Exported ${filePath}: ${succeeded}/${results.length} destination(s) succeeded`);
        } else if (succeeded > 0) {
            this.log.warn(summary, `Export incomplete for ${filePath}: ${succeeded}/${results.length} destination(s) succeeded`);
        } else {
            this.log.error(summary, `Export failed for ${filePath}: all ${results.length} destination(s) failed`);
        }
    }
}

/**
 * True iff `filePath` has at least one successful result in `results`.
 */
export function wasSuccessfullyExported(filePath: string, results: ReadonlyMap<string, readonly ExportResult[]>): boolean {
    return results.get(filePath)?.some(result => result.success) ?? false;
}
