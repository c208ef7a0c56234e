/**
 * Export strategies for multi-destination export.
 *
 * - all:          run every destination; the batch succeeds only if all succeed
 * - firstSuccess: run in order, stop right after the first success
 * - bestEffort:   run every destination; the batch succeeds if any succeeds
 *
 * Destinations run strictly one after another in the order given. Each
 * result is recorded on the context before the next destination starts.
 */

import type { Logger } from 'pino';
import { extractErrorMessage } from '../errors/sanitizer.js';
import { logger as rootLogger, getContextLogger } from '../logging/logger.js';
import type { ExportContext } from './context.js';
import type { ExportDestination } from './destination.js';
import { UnknownStrategyError } from './errors.js';
import { countSuccesses, createFailureResult, type ExportResult } from './result.js';

export const EXPORT_STRATEGIES = ['all', 'firstSuccess', 'bestEffort'] as const;

export type ExportStrategy = typeof EXPORT_STRATEGIES[number];

export function isExportStrategy(value: unknown): value is ExportStrategy {
    return EXPORT_STRATEGIES.some(strategy => strategy === value);
}

export function assertExportStrategy(value: string): ExportStrategy {
    if (!isExportStrategy(value)) {
        throw new UnknownStrategyError(value);
    }
    return value;
}

/**
 * Caller-side reading of a finished batch. `all` requires every attempted
 * destination to succeed; the other two need a single success.
 */
export function isBatchSuccessful(strategy: ExportStrategy, results: readonly ExportResult[]): boolean {
    switch (strategy) {
        case 'all':
            return results.every(result => result.success);
        case 'firstSuccess':
        case 'bestEffort':
            return results.some(result => result.success);
    }
}

async function runDestination(
    destination: ExportDestination,
    context: ExportContext,
    log: Logger
): Promise<ExportResult> {
    log.info({ destination: destination.name, priority: destination.priority }, `Exporting to ${destination.name}`);

    let result: ExportResult;
    try {
        result = await destination.export(context);
    } catch (error) {
        // Contract violation: export() must resolve. Record it and keep going.
        log.error({
            destination: destination.name,
            error: extractErrorMessage(error)
        }, 'Destination threw from export()');
        result = createFailureResult(
            destination.name,
            `Destination ${destination.name} threw: ${extractErrorMessage(error)}`
        );
    }

    context.addResult(destination.name, result);
    return result;
}

async function strategyAll(
    destinations: readonly ExportDestination[],
    context: ExportContext,
    log: Logger
): Promise<ExportResult[]> {
    const results: ExportResult[] = [];

    for (const destination of destinations) {
        const result = await runDestination(destination, context, log);
        results.push(result);

        if (result.success) {
            log.info({ destination: destination.name }, `Export to ${destination.name} succeeded`);
        } else {
            log.warn({ destination: destination.name, error: result.errorMessage }, `Export to ${destination.name} failed (all strategy)`);
        }
    }

    const successCount = countSuccesses(results);
    if (successCount === results.length) {
        log.info({ succeeded: successCount }, `All ${results.length} destination(s) succeeded (all strategy)`);
    } else {
        log.warn({ succeeded: successCount, attempted: results.length }, `Only ${successCount}/${results.length} destination(s) succeeded (all strategy)`);
    }

    return results;
}

async function strategyFirstSuccess(
    destinations: readonly ExportDestination[],
    context: ExportContext,
    log: Logger
): Promise<ExportResult[]> {
    const results: ExportResult[] = [];

    for (const destination of destinations) {
        const result = await runDestination(destination, context, log);
        results.push(result);

        if (result.success) {
            log.info({ destination: destination.name }, `Export succeeded to ${destination.name}, stopping (firstSuccess strategy)`);
            break;
        }
        log.warn({ destination: destination.name, error: result.errorMessage }, `Export to ${destination.name} failed`);
    }

    if (countSuccesses(results) === 0) {
        log.error({ attempted: results.length }, `All ${results.length} destination(s) failed (firstSuccess strategy)`);
    }

    return results;
}

async function strategyBestEffort(
    destinations: readonly ExportDestination[],
    context: ExportContext,
    log: Logger
): Promise<ExportResult[]> {
    const results: ExportResult[] = [];

    for (const destination of destinations) {
        const result = await runDestination(destination, context, log);
        results.push(result);

        if (result.success) {
            log.info({ destination: destination.name }, `Export to ${destination.name} succeeded`);
        } else {
            log.warn({ destination: destination.name, error: result.errorMessage }, `Export to ${destination.name} failed`);
        }
    }

    const successCount = countSuccesses(results);
    if (successCount > 0) {
        log.info({ succeeded: successCount, attempted: results.length }, `Export succeeded to ${successCount}/${results.length} destination(s) (bestEffort strategy)`);
    } else {
        log.error({ attempted: results.length }, `All ${results.length} destination(s) failed (bestEffort strategy)`);
    }

    return results;
}

/**
 * Runs `destinations` against `context` under the named strategy and returns
 * the results actually produced, in dispatch order.
 *
 * @throws UnknownStrategyError before any destination runs
 */
export async function executeStrategy(
    strategy: string,
    destinations: readonly ExportDestination[],
    context: ExportContext,
    log: Logger = rootLogger
): Promise<ExportResult[]> {
    const runLog = getContextLogger(context, log);

    switch (strategy) {
        case 'all':
            return strategyAll(destinations, context, runLog);
        case 'firstSuccess':
            return strategyFirstSuccess(destinations, context, runLog);
        case 'bestEffort':
            return strategyBestEffort(destinations, context, runLog);
        default:
            throw new UnknownStrategyError(strategy);
    }
}
