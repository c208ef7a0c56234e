/**
 * Export Destination Contract
 *
 * A destination is one repository integration (CDCS, eLabFTW, ...).
 * Instances are created once by the registry and reused across runs, so
 * they must keep no per-run state: everything run-specific lives on the
 * ExportContext.
 *
 * `export()` never rejects. Every failure (network, auth, malformed
 * response, unimplemented behaviour) comes back as a failed ExportResult.
 * Implementations should extend BaseDestination, which enforces this.
 */

import type { Logger } from 'pino';
import { extractErrorMessage } from '../errors/sanitizer.js';
import { logger as rootLogger, getContextLogger } from '../logging/logger.js';
import type { ExportContext } from './context.js';
import { createFailureResult, type ExportResult } from './result.js';

export const MIN_PRIORITY = 0;
export const MAX_PRIORITY = 1000;

export interface ConfigValidation {
    readonly valid: boolean;
    readonly error?: string;
}

export interface ExportDestination {
    /** Stable, unique identifier, e.g. "cdcs" */
    readonly name: string;
    /** 0-1000; higher runs earlier and is visible to lower priorities */
    readonly priority: number;
    /** True only when all required configuration is present. Cheap; re-read on every access. */
    readonly enabled: boolean;
    /** Deep configuration check (may contact the remote service). Used by preflight. */
    validateConfig(): Promise<ConfigValidation>;
    export(context: ExportContext): Promise<ExportResult>;
}

/**
 * Produces one destination instance. The registry's extension point is a
 * list of these.
 */
export type DestinationFactory = () => ExportDestination;

export const VALID_CONFIG: ConfigValidation = Object.freeze({ valid: true });

export function invalidConfig(error: string): ConfigValidation {
    return Object.freeze({ valid: false, error });
}

export function isValidPriority(priority: unknown): priority is number {
    return typeof priority === 'number'
        && Number.isInteger(priority)
        && priority >= MIN_PRIORITY
        && priority <= MAX_PRIORITY;
}

/**
 * Structural check used at discovery time: a candidate conforms when it
 * exposes every member of the contract with the right shape.
 */
export function isExportDestination(candidate: unknown): candidate is ExportDestination {
    if (candidate === null || typeof candidate !== 'object') {
        return false;
    }
    return 'name' in candidate && typeof candidate.name === 'string'
        && candidate.name.trim() !== ''
        && 'priority' in candidate && isValidPriority(candidate.priority)
        && 'enabled' in candidate && typeof candidate.enabled === 'boolean'
        && 'validateConfig' in candidate && typeof candidate.validateConfig === 'function'
        && 'export' in candidate && typeof candidate.export === 'function';
}

export abstract class BaseDestination implements ExportDestination {
    abstract readonly name: string;
    abstract readonly priority: number;
    abstract get enabled(): boolean;

    protected readonly log: Logger;

    constructor(log: Logger = rootLogger) {
        this.log = log;
    }

    abstract validateConfig(): Promise<ConfigValidation>;

    /**
     * For `enabled` checks: a settings section that fails to load disables
     * this destination and leaves the others alone.
     */
    protected readSettings<T>(load: () => T): T | undefined {
        try {
            return load();
        } catch (error) {
            this.log.warn({
                destination: this.name,
                error: extractErrorMessage(error)
            }, `Settings for ${this.name} could not be loaded; destination disabled`);
            return undefined;
        }
    }

    /**
     * Subclasses do the actual work here and may throw freely.
     */
    protected abstract performExport(context: ExportContext): Promise<ExportResult>;

    async export(context: ExportContext): Promise<ExportResult> {
        try {
            return await this.performExport(context);
        } catch (error) {
            getContextLogger(context, this.log).error({
                destination: this.name,
                filePath: context.filePath,
                error: extractErrorMessage(error)
            }, `Failed to export to ${this.name}`);

            return createFailureResult(this.name, extractErrorMessage(error));
        }
    }
}
