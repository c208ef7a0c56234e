/**
 * Unit Tests: Zod Middleware
 *
 * Tests input validation, using the session descriptor schema.
 *
 * @see libs/validation/zod-middleware.ts
 * @see libs/export/session.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { SessionDescriptorSchema } from '../../libs/export/session.js';
import { createValidator, validate, ValidationError } from '../../libs/validation/zod-middleware.js';

describe('Zod Middleware', () => {
    const validSession = {
        sessionIdentifier: 'sess-001',
        instrumentPid: 'FEI-Titan-TEM',
        timeRangeStart: new Date('2024-03-01T09:00:00.000Z'),
        timeRangeEnd: new Date('2024-03-01T11:30:00.000Z'),
        user: 'alice'
    };

    it('should validate correct input', () => {
        const result = validate(SessionDescriptorSchema, validSession, 'test-context');
        assert.deepStrictEqual(result, validSession);
    });

    it('should reject invalid input with detailed error', () => {
        const invalidInput = {
            ...validSession,
            sessionIdentifier: '',
            instrumentPid: 7
        };

        assert.throws(
            () => validate(SessionDescriptorSchema, invalidInput, 'test-context'),
            (err: unknown) => {
                assert.ok(err instanceof ValidationError);
                assert.ok(err.message.startsWith('Validation Violation in test-context: '));
                assert.deepStrictEqual(err.issues.map(issue => issue.path), ['sessionIdentifier', 'instrumentPid']);
                return true;
            }
        );
    });

    it('should reject a time range that ends before it starts', () => {
        assert.throws(
            () => validate(SessionDescriptorSchema, {
                ...validSession,
                timeRangeEnd: new Date('2024-03-01T08:00:00.000Z')
            }, 'range-test'),
            (err: unknown) => err instanceof ValidationError
                && err.issues[0]?.path === 'timeRangeEnd'
                && err.issues[0]?.message === 'timeRangeEnd must not precede timeRangeStart'
        );
    });

    it('should reject identifiers longer than the outcome log column', () => {
        assert.throws(
            () => validate(SessionDescriptorSchema, { ...validSession, sessionIdentifier: 'x'.repeat(37) }, 'length-test'),
            /Validation Violation/
        );
    });

    it('should reject missing required fields', () => {
        assert.throws(
            () => validate(SessionDescriptorSchema, { sessionIdentifier: 'sess-001' }, 'partial-test'),
            /Validation Violation/
        );
    });

    it('should create reusable validator factory', () => {
        const validateSession = createValidator(SessionDescriptorSchema);

        const valid = validateSession({ ...validSession, user: null }, 'factory-test');

        assert.strictEqual(valid.user, null);
    });
});
