/**
 * Unit Tests: PostgreSQL Outcome Log
 *
 * Transaction handling against a mocked pool.
 *
 * @see libs/export/pgOutcomeLog.ts
 */

import { describe, it, beforeEach, mock } from 'node:test';
import assert from 'node:assert';
import type { Pool } from 'pg';
import { ExportSystemError } from '../../libs/errors/sanitizer.js';
import { PgOutcomeLog } from '../../libs/export/pgOutcomeLog.js';
import { createFailureResult, createSuccessResult } from '../../libs/export/result.js';

describe('PgOutcomeLog', () => {
    let outcomeLog: PgOutcomeLog;
    let mockPool: { connect: ReturnType<typeof mock.fn>; query: ReturnType<typeof mock.fn> };
    let mockClient: { query: ReturnType<typeof mock.fn>; release: ReturnType<typeof mock.fn> };

    const finishedAt = new Date('2024-03-01T11:31:00.000Z');
    const results = [
        createSuccessResult('cdcs', {
            recordId: '77',
            recordUrl: 'https://cdcs.example.org/data?id=77',
            timestamp: finishedAt
        }),
        createFailureResult('labarchives', 'LabArchives API integration not yet implemented', {
            timestamp: finishedAt,
            metadata: { cdcsLinked: true }
        })
    ];

    function issuedQueries(): string[] {
        return mockClient.query.mock.calls.map((c: { arguments: unknown[] }) => {
            const sql = c.arguments[0];
            return typeof sql === 'string' && sql.includes('INSERT INTO export_outcome_log') ? 'INSERT' : String(sql);
        });
    }

    beforeEach(() => {
        mockClient = {
            query: mock.fn(async () => ({ rows: [] })),
            release: mock.fn()
        };

        mockPool = {
            connect: mock.fn(async () => mockClient),
            query: mock.fn(async () => ({ rows: [] }))
        };

        outcomeLog = new PgOutcomeLog(mockPool as unknown as Pool);
    });

    describe('append', () => {
        it('should insert every result inside one transaction', async () => {
            await outcomeLog.append('sess-001', results);

            assert.deepStrictEqual(issuedQueries(), ['BEGIN', 'INSERT', 'INSERT', 'COMMIT']);
            assert.strictEqual(mockPool.connect.mock.callCount(), 1);
            assert.strictEqual(mockClient.release.mock.callCount(), 1);
        });

        it('should bind the result fields in column order', async () => {
            await outcomeLog.append('sess-001', results);

            const success = mockClient.query.mock.calls[1]?.arguments[1];
            const failure = mockClient.query.mock.calls[2]?.arguments[1];

            assert.deepStrictEqual(success, [
                'sess-001', 'cdcs', true, '77', 'https://cdcs.example.org/data?id=77', null, finishedAt, null
            ]);
            assert.deepStrictEqual(failure, [
                'sess-001', 'labarchives', false, null, null,
                'LabArchives API integration not yet implemented', finishedAt, '{"cdcsLinked":true}'
            ]);
        });

        it('should not open a transaction for an empty batch', async () => {
            await outcomeLog.append('sess-001', []);

            assert.strictEqual(mockPool.connect.mock.callCount(), 0);
        });

        it('should roll back and raise a sanitized error when an insert fails', async () => {
            mockClient.query = mock.fn(async (sql: string) => {
                if (sql.includes('INSERT INTO export_outcome_log')) {
                    throw new Error('relation "export_outcome_log" does not exist');
                }
                return { rows: [] };
            });

            await assert.rejects(
                outcomeLog.append('sess-001', results),
                (err: unknown) => err instanceof ExportSystemError
                    && err.category === 'PERSIST'
                    && err.publicMessage === 'An internal system error occurred (OutcomeLog:AppendFailed)'
                    && err.incidentId.length > 0
            );

            assert.deepStrictEqual(issuedQueries(), ['BEGIN', 'INSERT', 'ROLLBACK']);
            assert.strictEqual(mockClient.release.mock.callCount(), 1);
        });

        it('should still release the client when rollback fails', async () => {
            mockClient.query = mock.fn(async (sql: string) => {
                if (sql === 'BEGIN') return { rows: [] };
                throw new Error('connection terminated');
            });

            await assert.rejects(outcomeLog.append('sess-001', results), ExportSystemError);
            assert.strictEqual(mockClient.release.mock.callCount(), 1);
        });
    });

    describe('findBySession', () => {
        it('should map rows to frozen entries', async () => {
            mockPool.query = mock.fn(async () => ({
                rows: [{
                    id: '7',
                    session_identifier: 'sess-001',
                    destination_name: 'cdcs',
                    success: true,
                    record_id: '77',
                    record_url: 'https://cdcs.example.org/data?id=77',
                    error_message: null,
                    timestamp: '2024-03-01T11:31:00.000Z',
                    metadata_json: null
                }]
            }));

            const entries = await outcomeLog.findBySession('sess-001');

            assert.strictEqual(entries.length, 1);
            assert.deepStrictEqual(entries[0], {
                id: 7,
                sessionIdentifier: 'sess-001',
                destinationName: 'cdcs',
                success: true,
                recordId: '77',
                recordUrl: 'https://cdcs.example.org/data?id=77',
                errorMessage: null,
                timestamp: finishedAt,
                metadataJson: null
            });
            assert.ok(Object.isFrozen(entries[0]));
            assert.deepStrictEqual(mockPool.query.mock.calls[0]?.arguments[1], ['sess-001']);
        });

        it('should sanitize query failures', async () => {
            mockPool.query = mock.fn(async () => {
                throw new Error('timeout expired');
            });

            await assert.rejects(
                outcomeLog.findBySession('sess-001'),
                (err: unknown) => err instanceof ExportSystemError
                    && err.publicMessage === 'An internal system error occurred (OutcomeLog:FindBySessionFailed)'
            );
        });
    });
});
