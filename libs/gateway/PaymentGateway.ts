/**
 * Push-payment gateway port.
 * The gateway prompts the buyer's phone and later reports the result through the webhook.
 */
export interface PushRequest {
    readonly gatewayReference: string;
    readonly phoneNumber: string;
    readonly amount: number;
    readonly currency: string;
    readonly description: string;
    readonly callbackUrl: string;
}

export interface PushResult {
    /** false when the gateway refused the request outright (no callback will follow) */
    readonly accepted: boolean;
    readonly message: string | null;
}

export interface PaymentGateway {
    /**
     * @throws GatewayUnavailableError when the gateway cannot be reached or answers with a server error
     */
    push(request: PushRequest): Promise<PushResult>;
}
