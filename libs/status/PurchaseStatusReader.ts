import type { ChannelSettlement } from '../broadcast/EventBroadcaster.js';
import { NotFoundError } from '../errors/taxonomy.js';
import type { PurchaseLedger } from '../ledger/PurchaseLedger.js';
import type { Purchase, PurchaseState } from '../ledger/purchase.js';
import { isRetryableState } from '../ledger/stateMachine.js';
import { outcomeEventFor, STATUS_MESSAGES } from './messages.js';

export interface PurchaseStatusView {
    readonly purchaseId: string;
    readonly status: PurchaseState;
    readonly message: string;
    /** Set only once the purchase is COMPLETED */
    readonly redirect: string | null;
    readonly retryable: boolean;
    /** Current attempt's linkage, needed by retry and streaming subscribe */
    readonly gatewayReference: string;
    readonly channelId: string;
}

export interface StatusReaderOptions {
    readonly successRedirectUrl: string;
    readonly maxRetries: number;
}

export function describePurchase(purchase: Purchase, options: StatusReaderOptions): PurchaseStatusView {
    return {
        purchaseId: purchase.id,
        status: purchase.state,
        message: STATUS_MESSAGES[purchase.state],
        redirect: purchase.state === 'COMPLETED' ? options.successRedirectUrl : null,
        retryable: isRetryableState(purchase.state) && purchase.retryCount < options.maxRetries,
        gatewayReference: purchase.gatewayReference,
        channelId: purchase.channelId
    };
}

/**
 * Polling Endpoint
 *
 * Pure reads straight from the ledger; nothing here caches or mutates.
 */
export class PurchaseStatusReader {
    constructor(
        private readonly ledger: PurchaseLedger,
        private readonly options: StatusReaderOptions
    ) { }

    /**
     * @throws NotFoundError for an unknown purchase id
     */
    public async status(purchaseId: string): Promise<PurchaseStatusView> {
        const purchase = await this.ledger.findById(purchaseId);
        if (!purchase) {
            throw new NotFoundError('Purchase not found');
        }

        return describePurchase(purchase, this.options);
    }

    /**
     * Ledger-derived settlement for a channel, used to answer subscribers that arrive late.
     */
    public async settlementForChannel(channelId: string): Promise<ChannelSettlement | null> {
        const purchase = await this.ledger.findByChannelId(channelId);
        if (!purchase) {
            return null;
        }
        if (purchase.state === 'CANCELLED') {
            return { kind: 'closed' };
        }
        const event = outcomeEventFor(purchase, this.options.successRedirectUrl);
        return event ? { kind: 'event', event } : null;
    }
}
