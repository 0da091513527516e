import type {
    GatewayOutcome,
    NewPurchase,
    Purchase,
    PurchaseAttempt,
    PurchasePatch
} from './purchase.js';

/**
 * View of one purchase while its row lock is held.
 * Everything done through it commits together when the work callback resolves.
 */
export interface LedgerTransaction {
    /** Current row, reflecting updates made in this transaction */
    readonly purchase: Purchase;
    attempt(gatewayReference: string): Promise<PurchaseAttempt | null>;
    update(patch: PurchasePatch): Promise<Purchase>;
    openAttempt(input: { gatewayReference: string; channelId: string }): Promise<PurchaseAttempt>;
    /**
     * Stores the gateway's answer on the attempt row. A reference keeps its first answer.
     */
    recordGatewayOutcome(gatewayReference: string, outcome: GatewayOutcome, amount: number | null): Promise<void>;
}

/**
 * Purchase Ledger
 *
 * Durable store of purchases and their attempts. State changes only happen
 * inside withPurchaseLock, which serializes work per purchase so concurrent
 * callers observe each other's committed result.
 */
export interface PurchaseLedger {
    /**
     * Creates a PENDING purchase and its first attempt atomically.
     * @throws InvalidStateError when the channel id or gateway reference is already in use
     */
    create(input: NewPurchase): Promise<Purchase>;
    findById(purchaseId: string): Promise<Purchase | null>;
    /** Matches the channel of the purchase's current attempt only */
    findByChannelId(channelId: string): Promise<Purchase | null>;
    findAttempt(gatewayReference: string): Promise<PurchaseAttempt | null>;
    /**
     * @throws NotFoundError when the purchase does not exist
     */
    withPurchaseLock<T>(purchaseId: string, work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
    /**
     * PENDING or TIMED_OUT purchases last touched before the cutoff, oldest first.
     */
    listAwaitingOutcome(updatedBefore: Date, limit: number): Promise<Purchase[]>;
    /**
     * COMPLETED purchases of a buyer; onDate (YYYY-MM-DD, UTC) narrows to one calendar day.
     */
    findCompletedByPhone(phoneNumber: string, onDate?: string): Promise<Purchase[]>;
}
