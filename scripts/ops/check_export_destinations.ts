/**
 * Export destination preflight.
 * Prints the check result and exits non-zero when it did not pass.
 */
import { checkExportDestinations, getDefaultRegistry } from '../../libs/export/index.js';
import { logger } from '../../libs/logging/logger.js';

async function main(): Promise<void> {
    const registry = getDefaultRegistry();
    const result = await checkExportDestinations(registry);

    for (const destination of registry.listDestinations()) {
        console.log(`${destination.enabled ? '[enabled] ' : '[disabled]'} ${destination.name} (priority ${destination.priority})`);
    }
    console.log(`${result.passed ? 'PASS' : 'FAIL'} ${result.name}: ${result.message}`);

    process.exitCode = result.passed ? 0 : 1;
}

main().catch((error: unknown) => {
    logger.fatal({ error }, 'Export destination preflight crashed');
    process.exitCode = 1;
});
