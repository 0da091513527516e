import { z } from 'zod';
import { GatewayUnavailableError } from '../errors/taxonomy.js';
import { getComponentLogger, maskPhone } from '../logging/logger.js';
import type { PaymentGateway, PushRequest, PushResult } from './PaymentGateway.js';

export interface HttpGatewayConfig {
    readonly baseUrl: string;
    readonly apiKey: string;
    readonly timeoutMs: number;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const PushResponseSchema = z.object({
    accepted: z.boolean(),
    message: z.string().optional()
});

/**
 * HTTP client for the push-payment gateway.
 */
export class HttpPaymentGateway implements PaymentGateway {
    private readonly logger = getComponentLogger('HttpPaymentGateway');

    constructor(
        private readonly config: HttpGatewayConfig,
        private readonly fetchImpl: FetchLike = fetch
    ) { }

    public async push(request: PushRequest): Promise<PushResult> {
        let response: Response;
        try {
            response = await this.fetchImpl(`${this.config.baseUrl}/push`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'Authorization': `Bearer ${this.config.apiKey}`,
                    'Idempotency-Key': request.gatewayReference
                },
                body: JSON.stringify({
                    reference: request.gatewayReference,
                    phoneNumber: request.phoneNumber,
                    amount: request.amount,
                    currency: request.currency,
                    description: request.description,
                    callbackUrl: request.callbackUrl
                }),
                signal: AbortSignal.timeout(this.config.timeoutMs)
            });
        } catch (error) {
            const reason = error instanceof Error && error.name === 'TimeoutError'
                ? `Gateway did not answer within ${this.config.timeoutMs}ms`
                : 'Gateway unreachable';
            this.logger.error({ reference: request.gatewayReference, error }, reason);
            throw new GatewayUnavailableError(reason, error);
        }

        if (response.status >= 500) {
            this.logger.error({ reference: request.gatewayReference, status: response.status }, 'Gateway server error');
            throw new GatewayUnavailableError(`Gateway answered ${response.status}`);
        }

        const body: unknown = await response.json().catch(() => null);

        if (!response.ok) {
            const message = typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string'
                ? body.message
                : `Gateway refused the request (${response.status})`;
            this.logger.warn(
                { reference: request.gatewayReference, status: response.status, phone: maskPhone(request.phoneNumber) },
                'Gateway refused push'
            );
            return { accepted: false, message };
        }

        const parsed = PushResponseSchema.safeParse(body);
        if (!parsed.success) {
            this.logger.error({ reference: request.gatewayReference }, 'Gateway returned an unreadable push response');
            throw new GatewayUnavailableError('Gateway returned an unreadable response');
        }

        this.logger.info(
            { reference: request.gatewayReference, accepted: parsed.data.accepted, phone: maskPhone(request.phoneNumber) },
            'Gateway push sent'
        );
        return { accepted: parsed.data.accepted, message: parsed.data.message ?? null };
    }
}
