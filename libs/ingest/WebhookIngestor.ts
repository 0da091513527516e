import { z } from 'zod';
import { AuthenticationError, ValidationError } from '../errors/taxonomy.js';
import { isAuthenticCallback, type CallbackCredentials } from '../gateway/signature.js';
import { getComponentLogger } from '../logging/logger.js';
import { createValidator } from '../validation/zod-middleware.js';
import type { Disposition, OutcomeApplier } from './OutcomeApplier.js';

export const GatewayCallbackSchema = z.object({
    reference: z.string().min(1).max(64),
    outcome: z.preprocess(
        value => typeof value === 'string' ? value.toUpperCase() : value,
        z.enum(['SUCCESS', 'FAILED'])
    ),
    amount: z.number().int().nonnegative(),
    message: z.string().max(500).optional(),
    metadata: z.record(z.unknown()).optional()
});

export type GatewayCallback = z.infer<typeof GatewayCallbackSchema>;

const parseCallback = createValidator(GatewayCallbackSchema);

export interface CallbackDelivery extends CallbackCredentials {
    /** Exact bytes received; the signature covers these */
    readonly rawBody: Buffer;
}

export interface WebhookAck {
    readonly acknowledged: true;
    readonly disposition: Disposition;
    readonly purchaseId: string;
}

/**
 * Idempotent Webhook Ingestor
 *
 * Authenticates and parses a gateway callback, then hands it to the OutcomeApplier.
 * Every authenticated, well-formed callback for a known reference is acknowledged,
 * whatever its disposition: business duplicates are never reported to the gateway as errors.
 */
export class WebhookIngestor {
    private readonly logger = getComponentLogger('WebhookIngestor');

    constructor(
        private readonly secret: string,
        private readonly applier: OutcomeApplier
    ) { }

    /**
     * @throws AuthenticationError on a missing or wrong signature/secret
     * @throws ValidationError on a malformed body
     * @throws NotFoundError for an unknown gateway reference
     */
    public async ingest(delivery: CallbackDelivery): Promise<WebhookAck> {
        if (!isAuthenticCallback(this.secret, delivery.rawBody, delivery)) {
            this.logger.warn(
                { hasSignature: Boolean(delivery.signature), hasSecret: Boolean(delivery.sharedSecret) },
                'Gateway callback failed authentication'
            );
            throw new AuthenticationError('Invalid callback signature');
        }

        let body: unknown;
        try {
            body = JSON.parse(delivery.rawBody.toString('utf8'));
        } catch (error) {
            this.logger.warn({ error }, 'Gateway callback body is not valid JSON');
            throw new ValidationError('Callback body is not valid JSON', [], error);
        }

        const callback = parseCallback(body, 'gateway callback');

        const result = await this.applier.applyGatewayOutcome({
            gatewayReference: callback.reference,
            outcome: callback.outcome,
            amount: callback.amount
        });

        this.logger.info(
            { reference: callback.reference, purchaseId: result.purchase.id, disposition: result.disposition },
            'Gateway callback processed'
        );

        return { acknowledged: true, disposition: result.disposition, purchaseId: result.purchase.id };
    }
}
