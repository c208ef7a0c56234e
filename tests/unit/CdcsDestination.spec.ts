/**
 * Unit Tests: CDCS Destination
 *
 * REST calls are answered in process through an axios adapter.
 *
 * @see libs/export/destinations/cdcs.ts
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { CdcsSettings } from '../../libs/config/exportSettings.js';
import { ExportContext } from '../../libs/export/context.js';
import { CdcsDestination } from '../../libs/export/destinations/cdcs.js';
import { fakeHttp, notFound, type FakeReply, type RecordedRequest } from '../support/fakeHttp.js';
import { silentLogger } from '../support/logCapture.js';

const BASE = 'https://cdcs.example.org';
const CONFIGURED: CdcsSettings = { url: BASE, token: 'test-secret' };

function healthyCdcs(request: RecordedRequest): FakeReply {
    const route = `${request.method} ${request.url}`;
    switch (route) {
        case `GET ${BASE}/rest/template-version-manager/global`:
            return { status: 200, data: [{ current: 'tpl-1' }, { current: 'tpl-2' }] };
        case `POST ${BASE}/rest/data/`:
            return { status: 201, data: { id: 77 } };
        case `GET ${BASE}/rest/workspace/read_access`:
            return { status: 200, data: [{ id: 'ws-9' }] };
        case `PATCH ${BASE}/rest/data/77/assign/ws-9`:
            return { status: 200, data: {} };
        default:
            return notFound();
    }
}

describe('CdcsDestination', () => {
    let workDir: string;
    let recordPath: string;
    let context: ExportContext;

    before(async () => {
        workDir = await mkdtemp(path.join(os.tmpdir(), 'cdcs-spec-'));
        recordPath = path.join(workDir, 'sess-001_record.xml');
        await writeFile(recordPath, '<record>sess-001</record>', 'utf-8');

        context = new ExportContext({
            filePath: recordPath,
            sessionIdentifier: 'sess-001',
            instrumentPid: 'FEI-Titan-TEM',
            timeRangeStart: new Date('2024-03-01T09:00:00.000Z'),
            timeRangeEnd: new Date('2024-03-01T11:30:00.000Z')
        });
    });

    after(async () => {
        await rm(workDir, { recursive: true, force: true });
    });

    function destination(responder = healthyCdcs, settings: CdcsSettings = CONFIGURED) {
        const http = fakeHttp(responder);
        const cdcs = new CdcsDestination({
            settings: () => settings,
            httpClientFactory: http.factory,
            requestTimeoutMs: 1234,
            logger: silentLogger
        });
        return { cdcs, requests: http.requests };
    }

    it('should identify itself as the highest priority destination', () => {
        const { cdcs } = destination();

        assert.strictEqual(cdcs.name, 'cdcs');
        assert.strictEqual(cdcs.priority, 100);
    });

    it('should be enabled only when both URL and token are set', () => {
        assert.strictEqual(destination().cdcs.enabled, true);
        assert.strictEqual(destination(healthyCdcs, { url: BASE }).cdcs.enabled, false);
        assert.strictEqual(destination(healthyCdcs, { token: 'test-secret' }).cdcs.enabled, false);
    });

    describe('validateConfig', () => {
        it('should report missing settings without contacting the server', async () => {
            const missingToken = destination(healthyCdcs, { url: BASE });
            const missingUrl = destination(healthyCdcs, { token: 'test-secret' });

            assert.deepStrictEqual(await missingToken.cdcs.validateConfig(), { valid: false, error: 'CDCS_TOKEN not configured' });
            assert.deepStrictEqual(await missingUrl.cdcs.validateConfig(), { valid: false, error: 'CDCS_URL not configured' });
            assert.strictEqual(missingToken.requests.length + missingUrl.requests.length, 0);
        });

        it('should check the workspace list with a short timeout', async () => {
            const { cdcs, requests } = destination();

            assert.deepStrictEqual(await cdcs.validateConfig(), { valid: true });
            assert.strictEqual(requests.length, 1);
            assert.strictEqual(requests[0]?.url, `${BASE}/rest/workspace/read_access`);
            assert.strictEqual(requests[0]?.timeout, 5000);
        });

        it('should report rejected credentials', async () => {
            const { cdcs } = destination(() => ({ status: 401, data: { detail: 'Invalid token.' } }));

            assert.deepStrictEqual(await cdcs.validateConfig(), {
                valid: false,
                error: 'CDCS authentication failed: Could not authenticate to CDCS'
            });
        });

        it('should report other failures as configuration errors', async () => {
            const { cdcs } = destination(() => ({ status: 200, data: [] }));

            const validation = await cdcs.validateConfig();

            assert.strictEqual(validation.valid, false);
            assert.ok(validation.error?.startsWith(`CDCS configuration error: Malformed response from ${BASE}/rest/workspace/read_access`));
        });
    });

    describe('export', () => {
        it('should upload the record, assign it to a workspace and return its URL', async () => {
            const { cdcs, requests } = destination();

            const result = await cdcs.export(context);

            assert.strictEqual(result.success, true);
            assert.strictEqual(result.destinationName, 'cdcs');
            assert.strictEqual(result.recordId, '77');
            assert.strictEqual(result.recordUrl, `${BASE}/data?id=77`);
            assert.deepStrictEqual(requests.map(r => `${r.method} ${r.url}`), [
                `GET ${BASE}/rest/template-version-manager/global`,
                `POST ${BASE}/rest/data/`,
                `GET ${BASE}/rest/workspace/read_access`,
                `PATCH ${BASE}/rest/data/77/assign/ws-9`
            ]);
        });

        it('should send the record under the first template with its file title', async () => {
            const { cdcs, requests } = destination();

            await cdcs.export(context);

            assert.deepStrictEqual(requests[1]?.data, {
                template: 'tpl-1',
                title: 'sess-001_record',
                xml_content: '<record>sess-001</record>'
            });
        });

        it('should authenticate every request and use the configured timeout', async () => {
            const { cdcs, requests } = destination();

            await cdcs.export(context);

            assert.ok(requests.every(r => r.authorization === 'Token test-secret'));
            assert.ok(requests.every(r => r.timeout === 1234));
        });

        it('should fail when the upload is refused', async () => {
            const { cdcs, requests } = destination(request =>
                request.method === 'POST'
                    ? { status: 400, data: { detail: 'bad xml' } }
                    : healthyCdcs(request));

            const result = await cdcs.export(context);

            assert.strictEqual(result.success, false);
            assert.strictEqual(result.errorMessage, 'CDCS upload failed: {"detail":"bad xml"}');
            assert.strictEqual(requests.length, 2);
        });

        it('should fail when the token is rejected', async () => {
            const { cdcs } = destination(() => ({ status: 403, data: { detail: 'forbidden' } }));

            const result = await cdcs.export(context);

            assert.strictEqual(result.success, false);
            assert.strictEqual(result.errorMessage, 'Could not authenticate to CDCS');
        });

        it('should fail when the workspace assignment is refused', async () => {
            const { cdcs } = destination(request =>
                request.method === 'PATCH'
                    ? { status: 500, data: 'workspace locked' }
                    : healthyCdcs(request));

            const result = await cdcs.export(context);

            assert.strictEqual(result.success, false);
            assert.strictEqual(result.errorMessage, 'CDCS workspace assignment failed: workspace locked');
        });

        it('should fail without any request when the record file is missing', async () => {
            const { cdcs, requests } = destination();
            const missing = new ExportContext({
                filePath: path.join(workDir, 'missing.xml'),
                sessionIdentifier: 'sess-002',
                instrumentPid: 'FEI-Titan-TEM',
                timeRangeStart: new Date('2024-03-01T09:00:00.000Z'),
                timeRangeEnd: new Date('2024-03-01T11:30:00.000Z')
            });

            const result = await cdcs.export(missing);

            assert.strictEqual(result.success, false);
            assert.ok(result.errorMessage?.startsWith('ENOENT'));
            assert.strictEqual(requests.length, 0);
        });

        it('should fail when not configured', async () => {
            const { cdcs } = destination(healthyCdcs, {});

            const result = await cdcs.export(context);

            assert.strictEqual(result.success, false);
            assert.strictEqual(result.errorMessage, 'CDCS is not configured (CDCS_URL and CDCS_TOKEN are required)');
        });
    });
});
