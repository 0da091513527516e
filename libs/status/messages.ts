import type { OutcomeEvent, Purchase, PurchaseState } from '../ledger/purchase.js';

/**
 * Buyer-facing wording per state. No internal detail ever goes into these.
 */
export const STATUS_MESSAGES: Readonly<Record<PurchaseState, string>> = Object.freeze({
    PENDING: 'Waiting for payment confirmation on your phone.',
    COMPLETED: 'Payment confirmed!',
    FAILED: 'Payment failed. Please check your phone and try again.',
    TIMED_OUT: 'We did not hear back from your phone in time. You can try again.',
    CANCELLED: 'Payment was cancelled.'
});

export const STREAM_TIMEOUT_MESSAGE = 'Payment request timed out.';

/**
 * Outcome event for a purchase that settled as COMPLETED or FAILED, null otherwise.
 */
export function outcomeEventFor(purchase: Purchase, successRedirectUrl: string): OutcomeEvent | null {
    if (purchase.state === 'COMPLETED') {
        return {
            purchaseId: purchase.id,
            status: 'COMPLETED',
            message: STATUS_MESSAGES.COMPLETED,
            redirect: successRedirectUrl
        };
    }
    if (purchase.state === 'FAILED') {
        return {
            purchaseId: purchase.id,
            status: 'FAILED',
            message: STATUS_MESSAGES.FAILED,
            redirect: null
        };
    }
    return null;
}
