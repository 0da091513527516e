/**
 * Unit Tests: Checkout initiation
 *
 * @see libs/checkout/CheckoutService.ts
 * @see libs/checkout/AttemptDispatcher.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { InvalidStateError, NotFoundError, ValidationError } from '../../libs/errors/taxonomy.js';
import { ASSET_A, ASSET_B, buildEngine, CALLBACK_URL, newChannelId, signedCallback } from '../support/engine.js';

describe('CheckoutService', () => {
    it('creates a pending purchase priced from the catalog and pushes it', async () => {
        const engine = buildEngine();
        const channelId = newChannelId();

        const result = await engine.checkout.initiate({ phoneNumber: '0711 000 000', assetRef: ASSET_B.ref, channelId });

        assert.strictEqual(result.status, 'PENDING');
        assert.strictEqual(result.pushAccepted, true);
        assert.strictEqual(result.channelId, channelId);
        assert.match(result.gatewayReference, /^CR-[0-9a-f]{24}$/);

        const purchase = await engine.ledger.findById(result.purchaseId);
        assert.strictEqual(purchase?.phoneNumber, '0711000000');
        assert.strictEqual(purchase?.amount, 2500);
        assert.strictEqual(purchase?.currency, 'KES');
        assert.strictEqual(purchase?.retryCount, 0);

        assert.deepStrictEqual(engine.gateway.pushes, [{
            gatewayReference: result.gatewayReference,
            phoneNumber: '0711000000',
            amount: 2500,
            currency: 'KES',
            description: 'Asset B',
            callbackUrl: CALLBACK_URL
        }]);
    });

    it('writes the first attempt together with the purchase', async () => {
        const engine = buildEngine();
        const result = await engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: ASSET_A.ref, channelId: newChannelId() });

        const attempts = engine.ledger.attemptsOf(result.purchaseId);
        assert.strictEqual(attempts.length, 1);
        assert.strictEqual(attempts[0]?.gatewayReference, result.gatewayReference);
        assert.strictEqual(attempts[0]?.attemptNumber, 1);
        assert.strictEqual(attempts[0]?.gatewayOutcome, null);
    });

    it('settles the purchase as FAILED when the gateway refuses the push', async () => {
        const engine = buildEngine();
        engine.gateway.mode = 'refuse';
        const channelId = newChannelId();

        const result = await engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: ASSET_A.ref, channelId });

        assert.strictEqual(result.pushAccepted, false);
        assert.strictEqual(result.status, 'FAILED');
        assert.strictEqual(result.message, 'Payment failed. Please check your phone and try again.');
        const purchase = await engine.ledger.findById(result.purchaseId);
        assert.strictEqual(purchase?.failureReason, 'PUSH_REJECTED');
        assert.strictEqual(engine.broadcaster.isSettled(channelId), true);
        assert.strictEqual(engine.ledger.attemptsOf(result.purchaseId)[0]?.gatewayOutcome, null);
        assert.strictEqual((await engine.statusReader.status(result.purchaseId)).retryable, true);
    });

    it('leaves the purchase PENDING when the push outcome is unknown', async () => {
        const engine = buildEngine();
        engine.gateway.mode = 'unavailable';
        const channelId = newChannelId();

        const result = await engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: ASSET_A.ref, channelId });

        assert.strictEqual(result.pushAccepted, false);
        assert.strictEqual(result.status, 'PENDING');
        assert.strictEqual(engine.broadcaster.isSettled(channelId), false);
        assert.strictEqual(engine.ledger.attemptsOf(result.purchaseId)[0]?.gatewayOutcome, null);
    });

    it('completes a purchase whose push was lost in transit once the success callback arrives', async () => {
        const engine = buildEngine();
        engine.gateway.mode = 'unavailable';
        const result = await engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: ASSET_A.ref, channelId: newChannelId() });

        const ack = await engine.ingestor.ingest(signedCallback({ reference: result.gatewayReference, outcome: 'SUCCESS', amount: 1000 }));

        assert.strictEqual(ack.disposition, 'APPLIED');
        assert.strictEqual((await engine.ledger.findById(result.purchaseId))?.state, 'COMPLETED');
        assert.strictEqual(engine.broadcaster.isSettled(result.channelId), true);
    });

    it('lets the expiry worker settle a push lost in transit when no callback comes', async () => {
        const engine = buildEngine({ pendingExpiryMs: 60_000 });
        engine.gateway.mode = 'unavailable';
        const result = await engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: ASSET_A.ref, channelId: newChannelId() });
        engine.clock.advance(120_000);

        assert.strictEqual((await engine.expiryWorker.runSweep()).expired, 1);
        assert.strictEqual((await engine.ledger.findById(result.purchaseId))?.failureReason, 'EXPIRED');
    });

    it('rejects a channel id that is already in use', async () => {
        const engine = buildEngine();
        const channelId = newChannelId();
        await engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: ASSET_A.ref, channelId });

        await assert.rejects(
            engine.checkout.initiate({ phoneNumber: '0722000000', assetRef: ASSET_A.ref, channelId }),
            InvalidStateError
        );
        assert.strictEqual(engine.gateway.pushes.length, 1);
    });

    it('fails with NotFoundError for an unknown asset', async () => {
        const engine = buildEngine();
        await assert.rejects(
            engine.checkout.initiate({ phoneNumber: '0711000000', assetRef: 'asset-missing', channelId: newChannelId() }),
            NotFoundError
        );
    });

    it('rejects malformed requests before any write', async () => {
        const engine = buildEngine();
        await assert.rejects(engine.checkout.initiate({ phoneNumber: '0711000000' }), ValidationError);
        await assert.rejects(
            engine.checkout.initiate({ phoneNumber: 'call me', assetRef: ASSET_A.ref, channelId: newChannelId() }),
            ValidationError
        );
        assert.strictEqual(engine.gateway.pushes.length, 0);
    });
});
