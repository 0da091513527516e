import type { EventBroadcaster } from '../broadcast/EventBroadcaster.js';
import { NotFoundError } from '../errors/taxonomy.js';
import type { LedgerTransaction, PurchaseLedger } from '../ledger/PurchaseLedger.js';
import type { GatewayOutcome, Purchase } from '../ledger/purchase.js';
import { assertTransition, awaitsGatewayOutcome } from '../ledger/stateMachine.js';
import { getComponentLogger } from '../logging/logger.js';
import { outcomeEventFor } from '../status/messages.js';
import { systemClock, type Clock } from '../time/clock.js';

export type Disposition =
    | 'APPLIED'
    | 'DUPLICATE'
    | 'CONFLICT'
    | 'SUPERSEDED'
    | 'RECORDED_AFTER_CANCEL';

export const FAILURE_REASONS = {
    GATEWAY_DECLINED: 'GATEWAY_DECLINED',
    AMOUNT_MISMATCH: 'AMOUNT_MISMATCH',
    PUSH_REJECTED: 'PUSH_REJECTED',
    EXPIRED: 'EXPIRED'
} as const;

export interface OutcomeReport {
    readonly gatewayReference: string;
    readonly outcome: GatewayOutcome;
    /** Amount the gateway reports, minor units; null when it reported none */
    readonly amount: number | null;
}

export interface ApplyResult {
    readonly disposition: Disposition;
    readonly purchase: Purchase;
}

/**
 * Outcome Applier
 *
 * The one place a purchase settles as COMPLETED or FAILED. Each call runs under the
 * purchase's row lock; the outcome event is published only after that transaction
 * has committed, and only when this call performed the transition.
 */
export class OutcomeApplier {
    private readonly logger = getComponentLogger('OutcomeApplier');

    constructor(
        private readonly ledger: PurchaseLedger,
        private readonly broadcaster: EventBroadcaster,
        private readonly successRedirectUrl: string,
        private readonly clock: Clock = systemClock
    ) { }

    /**
     * @throws NotFoundError when the reference was never issued
     */
    public async applyGatewayOutcome(report: OutcomeReport): Promise<ApplyResult> {
        const attempt = await this.ledger.findAttempt(report.gatewayReference);
        if (!attempt) {
            this.logger.warn({ reference: report.gatewayReference }, 'Outcome for unknown gateway reference');
            throw new NotFoundError('Unknown gateway reference');
        }

        const result = await this.ledger.withPurchaseLock(attempt.purchaseId, async (tx): Promise<ApplyResult> => {
            const recorded = await tx.attempt(report.gatewayReference);
            const log = { purchaseId: tx.purchase.id, reference: report.gatewayReference, outcome: report.outcome };

            if (recorded?.gatewayOutcome) {
                if (recorded.gatewayOutcome === report.outcome) {
                    this.logger.info(log, 'Duplicate gateway outcome ignored');
                    return { disposition: 'DUPLICATE', purchase: tx.purchase };
                }
                this.logger.warn({ ...log, recordedOutcome: recorded.gatewayOutcome }, 'Conflicting gateway outcome ignored');
                return { disposition: 'CONFLICT', purchase: tx.purchase };
            }

            await tx.recordGatewayOutcome(report.gatewayReference, report.outcome, report.amount);

            if (tx.purchase.gatewayReference !== report.gatewayReference) {
                this.logger.info({ ...log, currentReference: tx.purchase.gatewayReference }, 'Outcome for superseded reference recorded');
                return { disposition: 'SUPERSEDED', purchase: tx.purchase };
            }

            if (tx.purchase.state === 'CANCELLED') {
                const level = report.outcome === 'SUCCESS' ? 'warn' : 'info';
                this.logger[level](log, 'Outcome for cancelled purchase recorded for reconciliation');
                return { disposition: 'RECORDED_AFTER_CANCEL', purchase: tx.purchase };
            }

            if (!awaitsGatewayOutcome(tx.purchase.state)) {
                const level = report.outcome === 'SUCCESS' ? 'warn' : 'info';
                this.logger[level]({ ...log, state: tx.purchase.state }, 'Outcome arrived after purchase settled');
                return { disposition: 'DUPLICATE', purchase: tx.purchase };
            }

            if (report.outcome === 'SUCCESS' && report.amount !== null && report.amount !== tx.purchase.amount) {
                this.logger.warn({ ...log, expected: tx.purchase.amount, reported: report.amount }, 'Gateway amount mismatch');
                return this.settle(tx, 'FAILED', FAILURE_REASONS.AMOUNT_MISMATCH);
            }

            if (report.outcome === 'SUCCESS') {
                return this.settle(tx, 'COMPLETED', null);
            }
            return this.settle(tx, 'FAILED', FAILURE_REASONS.GATEWAY_DECLINED);
        });

        this.afterCommit(result);
        return result;
    }

    /**
     * Settle a purchase whose push the gateway refused outright. Nothing is written on
     * the attempt row: that column holds only what the gateway reports by callback.
     * Returns null when the attempt is no longer current or a callback already landed.
     */
    public async settleRefusedPush(purchase: Purchase): Promise<ApplyResult | null> {
        const result = await this.ledger.withPurchaseLock(purchase.id, async (tx): Promise<ApplyResult | null> => {
            if (tx.purchase.gatewayReference !== purchase.gatewayReference || !awaitsGatewayOutcome(tx.purchase.state)) {
                return null;
            }
            const recorded = await tx.attempt(purchase.gatewayReference);
            if (recorded?.gatewayOutcome) {
                return null;
            }
            return this.settle(tx, 'FAILED', FAILURE_REASONS.PUSH_REJECTED);
        });

        if (result) {
            this.afterCommit(result);
        }
        return result;
    }

    /**
     * Settle a purchase that has waited for the gateway since before `updatedBefore` as FAILED.
     * Returns null when the purchase moved on in the meantime.
     */
    public async expire(purchaseId: string, updatedBefore: Date): Promise<ApplyResult | null> {
        const result = await this.ledger.withPurchaseLock(purchaseId, async (tx): Promise<ApplyResult | null> => {
            if (!awaitsGatewayOutcome(tx.purchase.state) || tx.purchase.updatedAt.getTime() >= updatedBefore.getTime()) {
                return null;
            }
            return this.settle(tx, 'FAILED', FAILURE_REASONS.EXPIRED);
        });

        if (result) {
            this.afterCommit(result);
        }
        return result;
    }

    private async settle(tx: LedgerTransaction, target: 'COMPLETED' | 'FAILED', reason: string | null): Promise<ApplyResult> {
        assertTransition(tx.purchase.state, target);
        const purchase = await tx.update({
            state: target,
            failureReason: reason,
            completedAt: target === 'COMPLETED' ? this.clock() : null
        });
        return { disposition: 'APPLIED', purchase };
    }

    private afterCommit(result: ApplyResult): void {
        if (result.disposition !== 'APPLIED') {
            return;
        }
        const { purchase } = result;
        this.logger.info(
            { purchaseId: purchase.id, state: purchase.state, reason: purchase.failureReason },
            'Purchase settled'
        );

        const event = outcomeEventFor(purchase, this.successRedirectUrl);
        if (event) {
            this.broadcaster.publish(purchase.channelId, event);
        }
    }
}
