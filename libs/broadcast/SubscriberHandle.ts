import crypto from 'node:crypto';
import type { OutcomeEvent } from '../ledger/purchase.js';

export type NextResult =
    | { kind: 'event'; event: OutcomeEvent }
    /** No event within the wait bound */
    | { kind: 'timeout' }
    /** Channel closed by the broadcaster (purchase cancelled) */
    | { kind: 'closed' }
    /** Waiter gave up (client disconnected) */
    | { kind: 'aborted' };

/**
 * One live subscriber of a channel.
 *
 * Holds at most one outcome: a channel carries a single terminal event, so the
 * mailbox is one slot and a second delivery is refused. Delivery never blocks.
 */
export class SubscriberHandle {
    public readonly id = crypto.randomUUID();

    private pending: OutcomeEvent | null = null;
    private accepted = false;
    private closed = false;
    private released = false;
    private waiter: ((result: NextResult) => void) | null = null;

    constructor(
        public readonly channelId: string,
        private readonly onRelease: (handle: SubscriberHandle) => void
    ) { }

    public get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Hand an outcome to this subscriber. Returns false if it already has one or is closed.
     */
    public deliver(event: OutcomeEvent): boolean {
        if (this.closed || this.accepted) {
            return false;
        }
        this.accepted = true;

        const waiter = this.waiter;
        if (waiter) {
            waiter({ kind: 'event', event });
        } else {
            this.pending = event;
        }
        return true;
    }

    public close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.waiter?.({ kind: 'closed' });
    }

    /**
     * Wait for the outcome. A delivered event is returned even if the handle was closed
     * afterwards; once it has been taken, the handle reads as closed.
     */
    public next(timeoutMs: number, signal?: AbortSignal): Promise<NextResult> {
        const pending = this.pending;
        if (pending) {
            this.pending = null;
            return Promise.resolve({ kind: 'event', event: pending });
        }
        if (this.closed || this.accepted) {
            return Promise.resolve({ kind: 'closed' });
        }
        if (signal?.aborted) {
            return Promise.resolve({ kind: 'aborted' });
        }
        if (this.waiter) {
            return Promise.reject(new Error('SubscriberHandle.next() is already waiting'));
        }

        return new Promise<NextResult>((resolve) => {
            const onAbort = () => finish({ kind: 'aborted' });
            const timer = setTimeout(() => finish({ kind: 'timeout' }), timeoutMs);

            const finish = (result: NextResult) => {
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                this.waiter = null;
                resolve(result);
            };

            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiter = finish;
        });
    }

    /**
     * Leave the channel. Safe to call more than once.
     */
    public unsubscribe(): void {
        if (this.released) {
            return;
        }
        this.released = true;
        this.closed = true;
        this.waiter?.({ kind: 'aborted' });
        this.onRelease(this);
    }
}
