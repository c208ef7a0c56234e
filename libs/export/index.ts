/**
 * Record Export Library
 *
 * Public surface of the export orchestration subsystem.
 */

import { getCoreSettings, loadCoreSettings } from '../config/exportSettings.js';
import { BUILTIN_DESTINATIONS } from './destinations/index.js';
import { ExportOrchestrator } from './orchestrator.js';
import type { OutcomeLog } from './outcomeLog.js';
import { DestinationRegistry } from './registry.js';

// Results & Context
export type {
    ExportResult,
    SuccessfulExportResult,
    FailedExportResult,
    ResultMetadata
} from './result.js';
export { createSuccessResult, createFailureResult, describeResult, countSuccesses } from './result.js';
export type { ExportContextInit } from './context.js';
export { ExportContext } from './context.js';

// Destination Contract
export type { ExportDestination, DestinationFactory, ConfigValidation } from './destination.js';
export { BaseDestination, isExportDestination, MIN_PRIORITY, MAX_PRIORITY } from './destination.js';

// Registry & Strategies
export { DestinationRegistry } from './registry.js';
export type { ExportStrategy } from './strategies.js';
export { EXPORT_STRATEGIES, executeStrategy, isBatchSuccessful, isExportStrategy } from './strategies.js';
export { ExportPreconditionError, UnknownStrategyError } from './errors.js';

// Orchestration & Persistence
export type { SessionDescriptor } from './session.js';
export type { ExportResultsByFile } from './orchestrator.js';
export { ExportOrchestrator, wasSuccessfullyExported } from './orchestrator.js';
export type { OutcomeLog, OutcomeLogEntry } from './outcomeLog.js';
export { InMemoryOutcomeLog } from './outcomeLog.js';
export { PgOutcomeLog } from './pgOutcomeLog.js';
export type { CheckResult } from './preflight.js';
export { checkExportDestinations } from './preflight.js';

let defaultRegistry: DestinationRegistry | null = null;

/**
 * Registry over the built-in destinations, created on first use and shared
 * by the process entry points.
 */
export function getDefaultRegistry(): DestinationRegistry {
    if (!defaultRegistry) {
        defaultRegistry = new DestinationRegistry({ catalog: BUILTIN_DESTINATIONS });
    }
    return defaultRegistry;
}

/**
 * Orchestrator wired to the default registry, writing to `outcomeLog`.
 * The strategy comes from EXPORT_STRATEGY in `env` (the process environment
 * unless given) and is checked on every exportRecords call.
 */
export function createExportOrchestrator(outcomeLog: OutcomeLog, env?: NodeJS.ProcessEnv): ExportOrchestrator {
    return new ExportOrchestrator({
        registry: getDefaultRegistry(),
        outcomeLog,
        strategy: () => (env ? loadCoreSettings(env) : getCoreSettings()).strategy
    });
}
