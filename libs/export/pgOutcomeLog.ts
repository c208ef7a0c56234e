/**
 * PostgreSQL Outcome Log
 *
 * Writes one `export_outcome_log` row per ExportResult. All rows of one
 * export run are inserted in a single transaction. Failures are rolled
 * back, sanitized and rethrown: losing an audit row silently is worse than
 * failing loudly.
 */

import type { Pool } from 'pg';
import { pino } from 'pino';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import type { ExportResult } from './result.js';
import { toOutcomeLogEntry, type OutcomeLog, type OutcomeLogEntry } from './outcomeLog.js';

const logger = pino({ name: 'OutcomeLog' });

interface OutcomeLogRow {
    id: string | number;
    session_identifier: string;
    destination_name: string;
    success: boolean;
    record_id: string | null;
    record_url: string | null;
    error_message: string | null;
    timestamp: Date | string;
    metadata_json: string | null;
}

const INSERT_OUTCOME = `
    INSERT INTO export_outcome_log (
        session_identifier,
        destination_name,
        success,
        record_id,
        record_url,
        error_message,
        "timestamp",
        metadata_json
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
`;

export class PgOutcomeLog implements OutcomeLog {
    constructor(private readonly pool: Pool) { }

    public async append(sessionIdentifier: string, results: readonly ExportResult[]): Promise<void> {
        if (results.length === 0) {
            return;
        }

        const client = await this.pool.connect();
        try {
            await client.query('BEGIN');

            for (const result of results) {
                const entry = toOutcomeLogEntry(sessionIdentifier, result);
                await client.query(INSERT_OUTCOME, [
                    entry.sessionIdentifier,
                    entry.destinationName,
                    entry.success,
                    entry.recordId,
                    entry.recordUrl,
                    entry.errorMessage,
                    entry.timestamp,
                    entry.metadataJson
                ]);
            }

            await client.query('COMMIT');

            logger.debug({
                event: 'OUTCOMES_PERSISTED',
                sessionIdentifier,
                count: results.length
            });
        } catch (error) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                logger.error({ error: rollbackError }, 'Failed to rollback outcome log transaction');
            }
            throw ErrorSanitizer.sanitize(error, 'OutcomeLog:AppendFailed', 'PERSIST');
        } finally {
            client.release();
        }
    }

    public async findBySession(sessionIdentifier: string): Promise<readonly OutcomeLogEntry[]> {
        try {
            const result = await this.pool.query<OutcomeLogRow>(
                `SELECT
                    id,
                    session_identifier,
                    destination_name,
                    success,
                    record_id,
                    record_url,
                    error_message,
                    "timestamp",
                    metadata_json
                 FROM export_outcome_log
                 WHERE session_identifier = $1
                 ORDER BY id ASC`,
                [sessionIdentifier]
            );
            return result.rows.map(mapRowToEntry);
        } catch (error) {
            throw ErrorSanitizer.sanitize(error, 'OutcomeLog:FindBySessionFailed', 'PERSIST');
        }
    }
}

function mapRowToEntry(row: OutcomeLogRow): OutcomeLogEntry {
    return Object.freeze({
        id: Number(row.id),
        sessionIdentifier: row.session_identifier,
        destinationName: row.destination_name,
        success: row.success,
        recordId: row.record_id,
        recordUrl: row.record_url,
        errorMessage: row.error_message,
        timestamp: row.timestamp instanceof Date ? row.timestamp : new Date(row.timestamp),
        metadataJson: row.metadata_json
    });
}
