import { describe, it } from 'node:test';
import assert from 'node:assert';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';
import { pino } from 'pino';
import { Writable } from 'stream';

describe('Log Redaction', () => {
    it('should redact destination credentials in objects', () => {
        let written = 0;
        const stream = new Writable({
            write(chunk, _encoding, callback) {
                const log = JSON.parse(chunk.toString());
                assert.strictEqual(log.token, REDACT_CENSOR);
                assert.strictEqual(log.apiKey, REDACT_CENSOR);
                assert.strictEqual(log.settings.cdcsToken, REDACT_CENSOR);
                assert.strictEqual(log.request.headers.Authorization, REDACT_CENSOR);
                assert.strictEqual(log.settings.url, 'https://cdcs.example.org');
                assert.strictEqual(log.visible, 'ok');
                written += 1;
                callback();
            }
        });

        const testLogger = pino({
            redact: {
                paths: REDACT_KEYS,
                censor: REDACT_CENSOR
            }
        }, stream);

        testLogger.info({
            token: 'test-secret',
            apiKey: 'test-secret',
            settings: {
                url: 'https://cdcs.example.org',
                cdcsToken: 'test-secret'
            },
            request: {
                headers: { Authorization: 'Token test-secret' }
            },
            visible: 'ok'
        }, 'test message');

        assert.strictEqual(written, 1);
    });
});
