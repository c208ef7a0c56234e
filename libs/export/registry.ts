/**
 * Destination Registry
 *
 * Discovers destinations from a catalog of factories, filters them to the
 * enabled ones and orders them by priority. A registry is an explicit value:
 * the process entry points share `getDefaultRegistry()`, tests build their own.
 *
 * Ordering: priority descending, ties broken by registration order. When a
 * name is registered twice the later destination replaces the earlier one
 * and takes the later registration position.
 */

import type { Logger } from 'pino';
import { extractErrorMessage } from '../errors/sanitizer.js';
import { logger as rootLogger } from '../logging/logger.js';
import type { ExportContext } from './context.js';
import { isExportDestination, type DestinationFactory, type ExportDestination } from './destination.js';
import type { ExportResult } from './result.js';
import { executeStrategy } from './strategies.js';

export interface DestinationRegistryOptions {
    /**
     * The extension point. `undefined` means the catalog could not be located;
     * the registry then warns and behaves as if it were empty.
     */
    readonly catalog: readonly DestinationFactory[] | undefined;
    readonly logger?: Logger;
}

export class DestinationRegistry {
    private readonly destinations = new Map<string, ExportDestination>();
    private readonly catalog: readonly DestinationFactory[] | undefined;
    private readonly log: Logger;
    private discovered = false;

    constructor(options: DestinationRegistryOptions) {
        this.catalog = options.catalog;
        this.log = (options.logger ?? rootLogger).child({ component: 'DestinationRegistry' });
    }

    get isDiscovered(): boolean {
        return this.discovered;
    }

    /**
     * Instantiates every catalog entry once. Later calls are no-ops.
     */
    discover(): void {
        if (this.discovered) {
            return;
        }
        this.discovered = true;

        if (this.catalog === undefined) {
            this.log.warn('Destination catalog not found; no export destinations available');
            return;
        }

        this.log.info({ candidates: this.catalog.length }, 'Discovering export destinations');

        this.catalog.forEach((factory, index) => {
            // A failure while building or checking an entry skips that entry only
            try {
                const candidate: unknown = factory();
                if (!isExportDestination(candidate)) {
                    this.log.warn({ index }, 'Catalog entry does not satisfy the destination contract; skipped');
                    return;
                }
                this.add(candidate);
            } catch (error) {
                this.log.error({ index, error: extractErrorMessage(error) }, 'Failed to load export destination');
            }
        });

        this.log.info({
            count: this.destinations.size,
            destinations: [...this.destinations.keys()]
        }, `Discovered ${this.destinations.size} export destination(s)`);
    }

    /**
     * Registers a destination explicitly, alongside whatever discovery finds.
     */
    register(destination: ExportDestination): void {
        if (!isExportDestination(destination)) {
            throw new TypeError('Object does not satisfy the export destination contract');
        }
        this.add(destination);
    }

    private add(destination: ExportDestination): void {
        if (this.destinations.has(destination.name)) {
            this.log.warn({ destination: destination.name }, 'Duplicate destination name; later registration replaces the earlier one');
            this.destinations.delete(destination.name);
        }
        this.destinations.set(destination.name, destination);
        this.log.debug({ destination: destination.name, priority: destination.priority }, 'Registered export destination');
    }

    /**
     * Every registered destination, enabled or not, in registration order.
     */
    listDestinations(): ExportDestination[] {
        this.discover();
        return [...this.destinations.values()];
    }

    getDestination(name: string): ExportDestination | undefined {
        this.discover();
        return this.destinations.get(name);
    }

    /**
     * Enabled destinations, priority descending; equal priorities keep
     * registration order (Array.prototype.sort is stable).
     */
    getEnabledDestinations(): ExportDestination[] {
        return this.listDestinations()
            .filter(destination => this.isEnabled(destination))
            .sort((a, b) => b.priority - a.priority);
    }

    private isEnabled(destination: ExportDestination): boolean {
        try {
            return destination.enabled;
        } catch (error) {
            this.log.warn({
                destination: destination.name,
                error: extractErrorMessage(error)
            }, 'Could not determine whether destination is enabled; treating as disabled');
            return false;
        }
    }

    exportToAll(context: ExportContext, strategy: string): Promise<ExportResult[]> {
        return executeStrategy(strategy, this.getEnabledDestinations(), context, this.log);
    }
}
