/**
 * Unit Tests: Polling Endpoint
 *
 * @see libs/status/PurchaseStatusReader.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { NotFoundError } from '../../libs/errors/taxonomy.js';
import { ASSET_A, buildEngine, newChannelId, REDIRECT_URL, signedCallback } from '../support/engine.js';

describe('PurchaseStatusReader', () => {
    it('reports a pending purchase without a redirect', async () => {
        const engine = buildEngine();
        const created = await engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: ASSET_A.ref, channelId: newChannelId() });

        const view = await engine.statusReader.status(created.purchaseId);

        assert.deepStrictEqual(view, {
            purchaseId: created.purchaseId,
            status: 'PENDING',
            message: 'Waiting for payment confirmation on your phone.',
            redirect: null,
            retryable: false,
            gatewayReference: created.gatewayReference,
            channelId: created.channelId
        });
    });

    it('reports COMPLETED with the redirect target', async () => {
        const engine = buildEngine();
        const created = await engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: ASSET_A.ref, channelId: newChannelId() });
        await engine.ingestor.ingest(signedCallback({ reference: created.gatewayReference, outcome: 'SUCCESS', amount: 1000 }));

        const view = await engine.statusReader.status(created.purchaseId);

        assert.strictEqual(view.status, 'COMPLETED');
        assert.strictEqual(view.message, 'Payment confirmed!');
        assert.strictEqual(view.redirect, REDIRECT_URL);
        assert.strictEqual(view.retryable, false);
    });

    it('marks TIMED_OUT and FAILED purchases retryable', async () => {
        const engine = buildEngine();
        const created = await engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: ASSET_A.ref, channelId: newChannelId() });
        await engine.controller.reportTimeout(created.purchaseId);

        const timedOut = await engine.statusReader.status(created.purchaseId);
        assert.strictEqual(timedOut.status, 'TIMED_OUT');
        assert.strictEqual(timedOut.retryable, true);
        assert.strictEqual(timedOut.message, 'We did not hear back from your phone in time. You can try again.');

        await engine.ingestor.ingest(signedCallback({ reference: created.gatewayReference, outcome: 'FAILED', amount: 1000 }));
        const failed = await engine.statusReader.status(created.purchaseId);
        assert.strictEqual(failed.status, 'FAILED');
        assert.strictEqual(failed.retryable, true);
    });

    it('never reports a state the ledger did not hold', async () => {
        const engine = buildEngine();
        const created = await engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: ASSET_A.ref, channelId: newChannelId() });

        const [, view] = await Promise.all([
            engine.ingestor.ingest(signedCallback({ reference: created.gatewayReference, outcome: 'SUCCESS', amount: 1000 })),
            engine.statusReader.status(created.purchaseId)
        ]);
        const stored = await engine.ledger.findById(created.purchaseId);

        assert.ok(view.status === 'PENDING' || view.status === 'COMPLETED');
        assert.strictEqual(stored?.state, 'COMPLETED');
        assert.strictEqual((await engine.statusReader.status(created.purchaseId)).status, 'COMPLETED');
    });

    it('fails with NotFoundError for an unknown purchase', async () => {
        const engine = buildEngine();
        await assert.rejects(engine.statusReader.status('8a0f3c1e-2b7d-4e55-9a61-0c2f4d7b9e10'), NotFoundError);
    });

    it('derives a channel settlement from the ledger', async () => {
        const engine = buildEngine();
        const open = await engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: ASSET_A.ref, channelId: newChannelId() });
        const cancelled = await engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: ASSET_A.ref, channelId: newChannelId() });
        await engine.controller.cancel(cancelled.purchaseId);

        assert.strictEqual(await engine.statusReader.settlementForChannel(open.channelId), null);
        assert.deepStrictEqual(await engine.statusReader.settlementForChannel(cancelled.channelId), { kind: 'closed' });
        assert.strictEqual(await engine.statusReader.settlementForChannel('channel-unknown'), null);
    });
});
