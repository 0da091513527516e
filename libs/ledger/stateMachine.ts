import { InvalidStateError } from '../errors/taxonomy.js';
import type { PurchaseState } from './purchase.js';

/**
 * Purchase state graph.
 *
 * PENDING   -> COMPLETED | FAILED | TIMED_OUT | CANCELLED
 * TIMED_OUT -> COMPLETED | FAILED   (late gateway callback)
 * TIMED_OUT -> PENDING              (retry)
 * FAILED    -> PENDING              (retry)
 * COMPLETED, CANCELLED: no exits.
 */
export const TRANSITIONS: Readonly<Record<PurchaseState, readonly PurchaseState[]>> = Object.freeze({
    PENDING: ['COMPLETED', 'FAILED', 'TIMED_OUT', 'CANCELLED'],
    TIMED_OUT: ['COMPLETED', 'FAILED', 'PENDING'],
    FAILED: ['PENDING'],
    COMPLETED: [],
    CANCELLED: []
});

export function canTransition(from: PurchaseState, to: PurchaseState): boolean {
    return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: PurchaseState, to: PurchaseState): void {
    if (!canTransition(from, to)) {
        throw new InvalidStateError(`Purchase cannot move from ${from} to ${to}`, from);
    }
}

/**
 * States that still accept a gateway outcome for the current reference.
 */
export function awaitsGatewayOutcome(state: PurchaseState): boolean {
    return state === 'PENDING' || state === 'TIMED_OUT';
}

export function isRetryableState(state: PurchaseState): boolean {
    return state === 'FAILED' || state === 'TIMED_OUT';
}

/**
 * No automatic transition leaves these states.
 */
export function isTerminal(state: PurchaseState): boolean {
    return state !== 'PENDING';
}

/**
 * No transition of any kind leaves these states.
 */
export function isFinal(state: PurchaseState): boolean {
    return TRANSITIONS[state].length === 0;
}
