/**
 * Purchase Ledger Model
 *
 * The Purchase row is the single source of truth for a checkout's lifecycle.
 * PurchaseAttempt rows are append-only: one per gateway reference, recording
 * what the gateway reported for that reference.
 */

export const PURCHASE_STATES = ['PENDING', 'COMPLETED', 'FAILED', 'CANCELLED', 'TIMED_OUT'] as const;

export type PurchaseState = typeof PURCHASE_STATES[number];

/**
 * Final result reported by the gateway for one push request.
 */
export type GatewayOutcome = 'SUCCESS' | 'FAILED';

export interface Purchase {
    readonly id: string;
    /** Gateway reference of the current attempt */
    readonly gatewayReference: string;
    /** Broadcaster channel of the current attempt */
    readonly channelId: string;
    readonly state: PurchaseState;
    /** Normalized buyer phone number */
    readonly phoneNumber: string;
    /** Amount in the currency's minor unit */
    readonly amount: number;
    readonly currency: string;
    readonly assetRef: string;
    readonly retryCount: number;
    readonly failureReason: string | null;
    readonly createdAt: Date;
    readonly updatedAt: Date;
    readonly completedAt: Date | null;
}

export interface PurchaseAttempt {
    readonly gatewayReference: string;
    readonly purchaseId: string;
    readonly channelId: string;
    readonly attemptNumber: number;
    readonly gatewayOutcome: GatewayOutcome | null;
    readonly gatewayAmount: number | null;
    readonly outcomeReceivedAt: Date | null;
    readonly createdAt: Date;
}

export interface NewPurchase {
    readonly gatewayReference: string;
    readonly channelId: string;
    readonly phoneNumber: string;
    readonly amount: number;
    readonly currency: string;
    readonly assetRef: string;
}

/**
 * Fields a transition may change. Identity, buyer and price never change.
 */
export interface PurchasePatch {
    readonly state?: PurchaseState;
    readonly gatewayReference?: string;
    readonly channelId?: string;
    readonly retryCount?: number;
    readonly failureReason?: string | null;
    readonly completedAt?: Date | null;
}

/**
 * Terminal outcome delivered to streaming subscribers.
 */
export interface OutcomeEvent {
    readonly purchaseId: string;
    readonly status: 'COMPLETED' | 'FAILED';
    readonly message: string;
    readonly redirect: string | null;
}
