/**
 * Exports built records listed in a JSON manifest.
 *
 * Usage: export_records.ts <manifest.json> [--dry-run]
 *
 * The manifest is an array of
 *   { "filePath": "...", "session": { "sessionIdentifier", "instrumentPid",
 *     "timeRangeStart", "timeRangeEnd", "user"?, "metadata"? } }
 * with ISO-8601 times. `--dry-run` keeps outcomes in memory instead of
 * writing them to the database.
 */
import fs from 'fs';
import { z } from 'zod';
import { createPool } from '../../libs/db/pool.js';
import {
    createExportOrchestrator,
    describeResult,
    InMemoryOutcomeLog,
    PgOutcomeLog,
    wasSuccessfullyExported,
    type OutcomeLog
} from '../../libs/export/index.js';
import { SessionUserSchema } from '../../libs/export/session.js';
import { logger } from '../../libs/logging/logger.js';
import { validate } from '../../libs/validation/zod-middleware.js';

const ManifestSchema = z.array(z.object({
    filePath: z.string().min(1),
    session: z.object({
        sessionIdentifier: z.string().min(1),
        instrumentPid: z.string().min(1),
        timeRangeStart: z.coerce.date(),
        timeRangeEnd: z.coerce.date(),
        user: SessionUserSchema,
        metadata: z.record(z.unknown()).optional()
    })
}));

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const manifestPath = args.find(arg => !arg.startsWith('--'));
    const dryRun = args.includes('--dry-run');

    if (!manifestPath || !fs.existsSync(manifestPath)) {
        console.error('Usage: export_records.ts <manifest.json> [--dry-run]');
        process.exitCode = 2;
        return;
    }

    const manifest = validate(ManifestSchema, JSON.parse(fs.readFileSync(manifestPath, 'utf-8')), 'ExportRecords:Manifest');

    const pool = dryRun ? null : createPool();
    const outcomeLog: OutcomeLog = pool ? new PgOutcomeLog(pool) : new InMemoryOutcomeLog();

    try {
        const orchestrator = createExportOrchestrator(outcomeLog);
        const results = await orchestrator.exportRecords(
            manifest.map(entry => entry.filePath),
            manifest.map(entry => entry.session)
        );

        let failed = 0;
        for (const { filePath } of manifest) {
            const exported = wasSuccessfullyExported(filePath, results);
            if (!exported) failed += 1;
            console.log(`${exported ? 'EXPORTED' : 'NOT EXPORTED'} ${filePath}`);
            for (const result of results.get(filePath) ?? []) {
                console.log(`  ${describeResult(result)}${result.success ? '' : `: ${result.errorMessage}`}`);
            }
        }

        process.exitCode = failed === 0 ? 0 : 1;
    } finally {
        await pool?.end();
    }
}

main().catch((error: unknown) => {
    logger.fatal({ error }, 'Record export crashed');
    process.exitCode = 1;
});
