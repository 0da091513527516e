import type { PurchaseLedger } from '../ledger/PurchaseLedger.js';
import { getComponentLogger } from '../logging/logger.js';
import { systemClock, type Clock } from '../time/clock.js';
import type { OutcomeApplier } from './OutcomeApplier.js';

const DEFAULT_BATCH_SIZE = 100;

export interface ExpiryWorkerOptions {
    /** Hard bound on waiting for the gateway */
    readonly expiryMs: number;
    readonly intervalMs: number;
    readonly batchSize?: number;
}

export interface SweepResult {
    scanned: number;
    expired: number;
    skipped: boolean;
    errors: string[];
}

/**
 * Pending Expiry Worker
 *
 * Invariant: no purchase waits for the gateway longer than expiryMs. Purchases
 * still PENDING or TIMED_OUT past that bound are settled as FAILED (reason EXPIRED)
 * and their FAILED event is published, which keeps them retryable.
 */
export class PendingExpiryWorker {
    private readonly logger = getComponentLogger('PendingExpiryWorker');
    private intervalHandle: NodeJS.Timeout | null = null;
    private sweeping = false;

    constructor(
        private readonly ledger: PurchaseLedger,
        private readonly applier: OutcomeApplier,
        private readonly options: ExpiryWorkerOptions,
        private readonly clock: Clock = systemClock
    ) { }

    public start(): void {
        if (this.intervalHandle) {
            this.logger.warn('PendingExpiryWorker already running');
            return;
        }

        this.intervalHandle = setInterval(() => {
            void this.runSweep().catch(error => {
                this.logger.error({ error }, 'Expiry sweep failed');
            });
        }, this.options.intervalMs);
        this.intervalHandle.unref();
        this.logger.info({ intervalMs: this.options.intervalMs, expiryMs: this.options.expiryMs }, 'PendingExpiryWorker started');
    }

    public stop(): void {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
            this.logger.info('PendingExpiryWorker stopped');
        }
    }

    /**
     * One sweep. A sweep requested while another is running is skipped.
     */
    public async runSweep(): Promise<SweepResult> {
        const result: SweepResult = { scanned: 0, expired: 0, skipped: false, errors: [] };
        if (this.sweeping) {
            result.skipped = true;
            return result;
        }

        this.sweeping = true;
        try {
            const cutoff = new Date(this.clock().getTime() - this.options.expiryMs);
            const stale = await this.ledger.listAwaitingOutcome(cutoff, this.options.batchSize ?? DEFAULT_BATCH_SIZE);
            result.scanned = stale.length;

            for (const purchase of stale) {
                try {
                    const applied = await this.applier.expire(purchase.id, cutoff);
                    if (applied) {
                        result.expired++;
                    }
                } catch (error) {
                    const message = error instanceof Error ? error.message : String(error);
                    result.errors.push(`${purchase.id}: ${message}`);
                    this.logger.error({ error, purchaseId: purchase.id }, 'Failed to expire purchase');
                }
            }

            if (result.expired > 0 || result.errors.length > 0) {
                this.logger.info(result, 'Expiry sweep complete');
            }
            return result;
        } finally {
            this.sweeping = false;
        }
    }
}
