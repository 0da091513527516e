import type { AssetCatalog } from '../catalog/AssetCatalog.js';
import { GatewayUnavailableError } from '../errors/taxonomy.js';
import type { PaymentGateway, PushResult } from '../gateway/PaymentGateway.js';
import type { OutcomeApplier } from '../ingest/OutcomeApplier.js';
import type { Purchase } from '../ledger/purchase.js';
import { getComponentLogger, maskPhone } from '../logging/logger.js';

export interface DispatchResult {
    readonly pushAccepted: boolean;
    /**
     * Purchase after dispatch: FAILED when the gateway refused the push, otherwise
     * still PENDING (a push lost in transit may yet be answered by callback)
     */
    readonly purchase: Purchase;
    readonly message: string | null;
}

/**
 * Sends the gateway push for a purchase's current attempt.
 * Runs after the ledger commit, never under a purchase lock. Only an explicit refusal
 * settles the purchase here; when the push's fate is unknown the purchase stays PENDING
 * and the bounded wait or the expiry worker settles it.
 */
export class AttemptDispatcher {
    private readonly logger = getComponentLogger('AttemptDispatcher');

    constructor(
        private readonly gateway: PaymentGateway,
        private readonly applier: OutcomeApplier,
        private readonly catalog: AssetCatalog,
        private readonly callbackUrl: string
    ) { }

    public async dispatch(purchase: Purchase): Promise<DispatchResult> {
        const log = { purchaseId: purchase.id, reference: purchase.gatewayReference, phone: maskPhone(purchase.phoneNumber) };

        let result: PushResult;
        try {
            result = await this.gateway.push({
                gatewayReference: purchase.gatewayReference,
                phoneNumber: purchase.phoneNumber,
                amount: purchase.amount,
                currency: purchase.currency,
                description: this.catalog.find(purchase.assetRef)?.title ?? purchase.assetRef,
                callbackUrl: this.callbackUrl
            });
        } catch (error) {
            if (error instanceof GatewayUnavailableError) {
                this.logger.warn({ ...log, reason: error.message }, 'Gateway push outcome unknown; purchase left pending');
                return { pushAccepted: false, purchase, message: error.message };
            }
            this.logger.error({ ...log, error }, 'Unexpected failure during gateway push; purchase left pending');
            return { pushAccepted: false, purchase, message: 'Gateway push failed' };
        }

        if (result.accepted) {
            return { pushAccepted: true, purchase, message: result.message };
        }

        this.logger.warn({ ...log, message: result.message }, 'Gateway refused push; settling purchase as failed');
        const settled = await this.applier.settleRefusedPush(purchase);
        // null: a callback settled the attempt first
        return { pushAccepted: false, purchase: settled?.purchase ?? purchase, message: result.message };
    }
}
