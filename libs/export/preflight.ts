import { extractErrorMessage } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import type { ExportDestination } from './destination.js';
import type { DestinationRegistry } from './registry.js';

export interface CheckResult {
    readonly name: string;
    readonly passed: boolean;
    readonly severity: 'error' | 'warning';
    readonly message: string;
}

const CHECK_NAME = 'export_destinations';

/**
 * Preflight gate for export: at least one destination enabled, and every
 * enabled destination passes its deep configuration check.
 * Problems are reported as a failed check, never thrown.
 */
export async function checkExportDestinations(registry: DestinationRegistry): Promise<CheckResult> {
    let enabled: ExportDestination[];
    try {
        enabled = registry.getEnabledDestinations();
    } catch (error) {
        return {
            name: CHECK_NAME,
            passed: false,
            severity: 'warning',
            message: `Could not discover export destinations: ${extractErrorMessage(error)}`
        };
    }

    if (enabled.length === 0) {
        return {
            name: CHECK_NAME,
            passed: false,
            severity: 'warning',
            message: 'No export destinations are enabled. Built records will not be uploaded anywhere. '
                + 'Configure at least one destination (e.g., CDCS_URL and CDCS_TOKEN for CDCS).'
        };
    }

    const failures: string[] = [];
    for (const destination of enabled) {
        try {
            const { valid, error } = await destination.validateConfig();
            if (!valid) {
                failures.push(`${destination.name}: ${error ?? 'invalid configuration'}`);
            }
        } catch (error) {
            failures.push(`${destination.name}: unexpected error: ${extractErrorMessage(error)}`);
        }
    }

    if (failures.length > 0) {
        logger.warn({ failures }, 'Export destination preflight found configuration issues');
        return {
            name: CHECK_NAME,
            passed: false,
            severity: 'warning',
            message: 'Some export destinations have configuration issues '
                + `(transient network errors may be ignored): ${failures.join('; ')}`
        };
    }

    return {
        name: CHECK_NAME,
        passed: true,
        severity: 'warning',
        message: `Export destination(s) OK: ${enabled.map(destination => destination.name).join(', ')}.`
    };
}
