import type { EventBroadcaster } from '../broadcast/EventBroadcaster.js';
import { InvalidStateError, NotFoundError } from '../errors/taxonomy.js';
import { allocateChannelId, allocateGatewayReference } from '../gateway/reference.js';
import type { PurchaseLedger } from '../ledger/PurchaseLedger.js';
import { normalizePhoneNumber } from '../ledger/phoneNumber.js';
import type { Purchase } from '../ledger/purchase.js';
import { assertTransition, isRetryableState } from '../ledger/stateMachine.js';
import { getComponentLogger } from '../logging/logger.js';
import { describePurchase, type PurchaseStatusView, type StatusReaderOptions } from '../status/PurchaseStatusReader.js';
import { validate } from '../validation/zod-middleware.js';
import type { AttemptDispatcher } from './AttemptDispatcher.js';
import { PurchaseIdSchema, RetryRequestSchema } from './schemas.js';

export interface RetryResult extends PurchaseStatusView {
    readonly pushAccepted: boolean;
    readonly retriesRemaining: number;
}

/**
 * Retry / Cancel Controller
 *
 * Buyer-driven transitions. Each decision is taken under the purchase lock; the
 * gateway push for a retry and the channel close for a cancel happen after commit.
 */
export class RetryCancelController {
    private readonly logger = getComponentLogger('RetryCancelController');

    constructor(
        private readonly ledger: PurchaseLedger,
        private readonly dispatcher: AttemptDispatcher,
        private readonly broadcaster: EventBroadcaster,
        private readonly options: StatusReaderOptions
    ) { }

    /**
     * Start a new attempt for a FAILED or TIMED_OUT purchase under a new gateway
     * reference and channel id.
     * @throws NotFoundError when the purchase is unknown or the phone number does not match
     * @throws InvalidStateError when the state, the linkage reference or the retry budget forbids it
     */
    public async retry(input: unknown): Promise<RetryResult> {
        const request = validate(RetryRequestSchema, input, 'retry request');
        const phoneNumber = normalizePhoneNumber(request.phoneNumber);
        const nextReference = allocateGatewayReference();
        const nextChannel = allocateChannelId();

        const reopened = await this.ledger.withPurchaseLock(request.purchaseId, async (tx) => {
            const current = tx.purchase;
            if (current.phoneNumber !== phoneNumber) {
                throw new NotFoundError('Purchase not found');
            }
            if (!isRetryableState(current.state)) {
                throw new InvalidStateError(`A ${current.state} purchase cannot be retried`, current.state);
            }
            if (current.gatewayReference !== request.gatewayReference) {
                throw new InvalidStateError('This payment attempt was already retried', current.state);
            }
            if (current.retryCount >= this.options.maxRetries) {
                throw new InvalidStateError('Retry limit reached for this purchase', current.state);
            }
            assertTransition(current.state, 'PENDING');

            await tx.openAttempt({ gatewayReference: nextReference, channelId: nextChannel });
            return tx.update({
                state: 'PENDING',
                gatewayReference: nextReference,
                channelId: nextChannel,
                retryCount: current.retryCount + 1,
                failureReason: null
            });
        });

        this.logger.info(
            { purchaseId: reopened.id, reference: reopened.gatewayReference, retryCount: reopened.retryCount },
            'Purchase retried'
        );

        const dispatched = await this.dispatcher.dispatch(reopened);
        return {
            ...describePurchase(dispatched.purchase, this.options),
            pushAccepted: dispatched.pushAccepted,
            retriesRemaining: Math.max(0, this.options.maxRetries - dispatched.purchase.retryCount)
        };
    }

    /**
     * Abandon a PENDING purchase. Live subscribers of its channel are closed.
     * @throws InvalidStateError for any other state
     */
    public async cancel(purchaseId: string): Promise<PurchaseStatusView> {
        const id = validate(PurchaseIdSchema, purchaseId, 'purchase id');

        const cancelled = await this.ledger.withPurchaseLock(id, async (tx) => {
            assertTransition(tx.purchase.state, 'CANCELLED');
            return tx.update({ state: 'CANCELLED' });
        });

        this.broadcaster.close(cancelled.channelId);
        this.logger.info({ purchaseId: cancelled.id }, 'Purchase cancelled');
        return describePurchase(cancelled, this.options);
    }

    /**
     * Client-observed wait expiry: PENDING becomes TIMED_OUT. Any other state is
     * returned unchanged, which is how the client learns of an outcome that raced its timer.
     */
    public async reportTimeout(purchaseId: string): Promise<PurchaseStatusView> {
        const id = validate(PurchaseIdSchema, purchaseId, 'purchase id');

        const purchase = await this.ledger.withPurchaseLock(id, async (tx): Promise<Purchase> => {
            if (tx.purchase.state !== 'PENDING') {
                return tx.purchase;
            }
            assertTransition(tx.purchase.state, 'TIMED_OUT');
            return tx.update({ state: 'TIMED_OUT' });
        });

        this.logger.info({ purchaseId: purchase.id, state: purchase.state }, 'Client wait expiry reported');
        return describePurchase(purchase, this.options);
    }
}
