import type { Purchase } from '../ledger/purchase.js';

/**
 * Access Attempt audit model.
 *
 * Rows are append-only; the same rows drive the recovery rate-limit window.
 */

export type AccessOutcome = 'SUCCESS' | 'NO_MATCH' | 'LOCKED';

export interface AccessIdentity {
    /** Normalized phone number */
    readonly phoneNumber: string;
    readonly origin: string;
}

export interface AccessAttemptRecord {
    /** Phone number exactly as submitted */
    readonly submittedPhone: string;
    readonly phoneNumber: string;
    readonly origin: string;
    readonly outcome: AccessOutcome;
    readonly matchedPurchaseId: string | null;
    readonly attemptedAt: Date;
}

export interface WindowCount {
    readonly count: number;
    /** Earliest counted attempt in the window, null when count is 0 */
    readonly oldestAt: Date | null;
}

/**
 * Operations available while an identity's lock is held.
 */
export interface AccessAttemptScope {
    /** Counts SUCCESS and NO_MATCH attempts strictly after `since`; LOCKED rows are not counted */
    countSince(since: Date): Promise<WindowCount>;
    append(record: AccessAttemptRecord): Promise<void>;
    /** The identity's COMPLETED purchases made on a UTC calendar date, newest first */
    findCompletedPurchases(onDate: string): Promise<Purchase[]>;
}

export interface AccessAttemptLog {
    /**
     * Serializes attempts per (phone, origin) so a window check and the append that
     * follows it cannot interleave with a concurrent attempt for the same identity.
     */
    withIdentityLock<T>(identity: AccessIdentity, work: (scope: AccessAttemptScope) => Promise<T>): Promise<T>;
}
