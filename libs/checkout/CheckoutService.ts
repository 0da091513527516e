import type { AssetCatalog } from '../catalog/AssetCatalog.js';
import { allocateGatewayReference } from '../gateway/reference.js';
import type { PurchaseLedger } from '../ledger/PurchaseLedger.js';
import { normalizePhoneNumber } from '../ledger/phoneNumber.js';
import type { PurchaseState } from '../ledger/purchase.js';
import { getComponentLogger, maskPhone } from '../logging/logger.js';
import { STATUS_MESSAGES } from '../status/messages.js';
import { validate } from '../validation/zod-middleware.js';
import type { AttemptDispatcher } from './AttemptDispatcher.js';
import { CheckoutRequestSchema } from './schemas.js';

export interface CheckoutResult {
    readonly purchaseId: string;
    readonly gatewayReference: string;
    readonly channelId: string;
    readonly status: PurchaseState;
    readonly pushAccepted: boolean;
    readonly message: string;
}

/**
 * Checkout initiation: price the asset, open the purchase and its first attempt, push.
 */
export class CheckoutService {
    private readonly logger = getComponentLogger('CheckoutService');

    constructor(
        private readonly ledger: PurchaseLedger,
        private readonly catalog: AssetCatalog,
        private readonly dispatcher: AttemptDispatcher
    ) { }

    /**
     * @throws ValidationError for a malformed request or phone number
     * @throws NotFoundError for an unknown asset
     * @throws InvalidStateError when the channel id is already in use
     */
    public async initiate(input: unknown): Promise<CheckoutResult> {
        const request = validate(CheckoutRequestSchema, input, 'checkout request');
        const phoneNumber = normalizePhoneNumber(request.phoneNumber);
        const entry = this.catalog.price(request.assetRef);

        const created = await this.ledger.create({
            gatewayReference: allocateGatewayReference(),
            channelId: request.channelId,
            phoneNumber,
            amount: entry.amount,
            currency: entry.currency,
            assetRef: entry.ref
        });

        this.logger.info(
            { purchaseId: created.id, reference: created.gatewayReference, assetRef: entry.ref, phone: maskPhone(phoneNumber) },
            'Purchase created'
        );

        const dispatched = await this.dispatcher.dispatch(created);

        return {
            purchaseId: dispatched.purchase.id,
            gatewayReference: dispatched.purchase.gatewayReference,
            channelId: dispatched.purchase.channelId,
            status: dispatched.purchase.state,
            pushAccepted: dispatched.pushAccepted,
            message: STATUS_MESSAGES[dispatched.purchase.state]
        };
    }
}
