import { describe, it } from 'node:test';
import assert from 'node:assert';
import pino from 'pino';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';
import { setTimeout as delay } from 'node:timers/promises';
import { RequestContext } from '../../libs/context/requestContext.js';
import { buildLoggerOptions, maskPhone } from '../../libs/logging/logger.js';

describe('Log Redaction', () => {
    it('should redact sensitive keys in objects', () => {
        const lines: string[] = [];
        const testLogger = pino({
            redact: {
                paths: REDACT_KEYS,
                censor: REDACT_CENSOR
            }
        }, { write: (line: string) => { lines.push(line); } });

        testLogger.info({
            password: 'test-password',
            authorization: 'Bearer test-token',
            signature: 'test-signature',
            headers: { 'x-gateway-secret': 'test-secret', 'content-type': 'application/json' },
            nested: {
                secret: 'test-secret',
                other: 'safe'
            },
            visible: 'ok'
        }, 'test message');

        assert.strictEqual(lines.length, 1);
        const log = JSON.parse(lines[0] ?? '{}');
        assert.strictEqual(log.password, REDACT_CENSOR);
        assert.strictEqual(log.authorization, REDACT_CENSOR);
        assert.strictEqual(log.signature, REDACT_CENSOR);
        assert.strictEqual(log.headers['x-gateway-secret'], REDACT_CENSOR);
        assert.strictEqual(log.headers['content-type'], 'application/json');
        assert.strictEqual(log.nested.secret, REDACT_CENSOR);
        assert.strictEqual(log.nested.other, 'safe');
        assert.strictEqual(log.visible, 'ok');
    });
});

describe('maskPhone', () => {
    it('keeps the first four and last two characters', () => {
        assert.strictEqual(maskPhone('0711000000'), '0711****00');
        assert.strictEqual(maskPhone('+254711000000'), '+254*******00');
    });

    it('masks short values entirely', () => {
        assert.strictEqual(maskPhone('123456'), '******');
    });
});

describe('Request-scoped log fields', () => {
    it('tags lines from a component logger created outside any request', async () => {
        const lines: string[] = [];
        const root = pino(buildLoggerOptions('info'), { write: (line: string) => { lines.push(line); } });
        const component = root.child({ component: 'OutcomeApplier' });

        component.info('before');
        await RequestContext.run({ requestId: 'req-42', origin: '203.0.113.7' }, async () => {
            await delay(1);
            component.info('during');
        });
        component.info('after');

        const [before, during, after] = lines.map(line => JSON.parse(line));
        assert.strictEqual(before.requestId, undefined);
        assert.strictEqual(during.requestId, 'req-42');
        assert.strictEqual(during.origin, '203.0.113.7');
        assert.strictEqual(during.component, 'OutcomeApplier');
        assert.strictEqual(during.system, 'checkout-relay');
        assert.strictEqual(after.requestId, undefined);
    });
});
