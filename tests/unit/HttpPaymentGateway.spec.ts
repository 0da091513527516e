/**
 * Unit Tests: HTTP payment gateway client
 *
 * @see libs/gateway/HttpPaymentGateway.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { GatewayUnavailableError } from '../../libs/errors/taxonomy.js';
import { HttpPaymentGateway, type FetchLike } from '../../libs/gateway/HttpPaymentGateway.js';
import type { PushRequest } from '../../libs/gateway/PaymentGateway.js';

const CONFIG = { baseUrl: 'http://gateway.test/v1', apiKey: 'test-api-key', timeoutMs: 2000 };

const REQUEST: PushRequest = {
    gatewayReference: 'CR-00000000000000000000abcd',
    phoneNumber: '0711000000',
    amount: 1000,
    currency: 'KES',
    description: 'Asset A',
    callbackUrl: 'http://localhost:8080/api/webhooks/gateway'
};

interface RecordedCall {
    url: string;
    init: RequestInit;
}

function stubFetch(answer: () => Promise<Response>): { fetchImpl: FetchLike; calls: RecordedCall[] } {
    const calls: RecordedCall[] = [];
    const fetchImpl: FetchLike = async (url, init) => {
        calls.push({ url, init });
        return answer();
    };
    return { fetchImpl, calls };
}

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('HttpPaymentGateway', () => {
    it('posts the push request with credentials and an idempotency key', async () => {
        const { fetchImpl, calls } = stubFetch(async () => jsonResponse({ accepted: true }));
        const gateway = new HttpPaymentGateway(CONFIG, fetchImpl);

        const result = await gateway.push(REQUEST);

        assert.deepStrictEqual(result, { accepted: true, message: null });
        assert.strictEqual(calls.length, 1);
        assert.strictEqual(calls[0]?.url, 'http://gateway.test/v1/push');
        assert.strictEqual(calls[0]?.init.method, 'POST');

        const headers = new Headers(calls[0]?.init.headers);
        assert.strictEqual(headers.get('authorization'), 'Bearer test-api-key');
        assert.strictEqual(headers.get('idempotency-key'), REQUEST.gatewayReference);

        assert.strictEqual(typeof calls[0]?.init.body, 'string');
        assert.deepStrictEqual(JSON.parse(String(calls[0]?.init.body)), {
            reference: REQUEST.gatewayReference,
            phoneNumber: '0711000000',
            amount: 1000,
            currency: 'KES',
            description: 'Asset A',
            callbackUrl: REQUEST.callbackUrl
        });
    });

    it('returns a refusal with the gateway message for a 4xx answer', async () => {
        const { fetchImpl } = stubFetch(async () => jsonResponse({ message: 'Subscriber not reachable' }, 422));
        const gateway = new HttpPaymentGateway(CONFIG, fetchImpl);

        assert.deepStrictEqual(await gateway.push(REQUEST), { accepted: false, message: 'Subscriber not reachable' });
    });

    it('falls back to a generic refusal message', async () => {
        const { fetchImpl } = stubFetch(async () => new Response('nope', { status: 400 }));
        const gateway = new HttpPaymentGateway(CONFIG, fetchImpl);

        assert.deepStrictEqual(await gateway.push(REQUEST), { accepted: false, message: 'Gateway refused the request (400)' });
    });

    it('passes through a gateway that answers accepted=false', async () => {
        const { fetchImpl } = stubFetch(async () => jsonResponse({ accepted: false, message: 'Insufficient balance' }));
        const gateway = new HttpPaymentGateway(CONFIG, fetchImpl);

        assert.deepStrictEqual(await gateway.push(REQUEST), { accepted: false, message: 'Insufficient balance' });
    });

    it('treats 5xx as unavailable', async () => {
        const { fetchImpl } = stubFetch(async () => new Response('', { status: 503 }));
        const gateway = new HttpPaymentGateway(CONFIG, fetchImpl);

        await assert.rejects(
            gateway.push(REQUEST),
            (error: unknown) => error instanceof GatewayUnavailableError && error.message === 'Gateway answered 503'
        );
    });

    it('reports a timeout', async () => {
        const { fetchImpl } = stubFetch(async () => {
            throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
        });
        const gateway = new HttpPaymentGateway(CONFIG, fetchImpl);

        await assert.rejects(
            gateway.push(REQUEST),
            (error: unknown) => error instanceof GatewayUnavailableError && error.message === 'Gateway did not answer within 2000ms'
        );
    });

    it('reports a network failure', async () => {
        const { fetchImpl } = stubFetch(async () => {
            throw new TypeError('fetch failed');
        });
        const gateway = new HttpPaymentGateway(CONFIG, fetchImpl);

        await assert.rejects(
            gateway.push(REQUEST),
            (error: unknown) => error instanceof GatewayUnavailableError && error.message === 'Gateway unreachable'
        );
    });

    it('rejects an unreadable success body', async () => {
        const { fetchImpl } = stubFetch(async () => jsonResponse({ status: 'queued' }));
        const gateway = new HttpPaymentGateway(CONFIG, fetchImpl);

        await assert.rejects(gateway.push(REQUEST), GatewayUnavailableError);
    });
});
