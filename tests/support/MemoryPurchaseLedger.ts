import crypto from 'node:crypto';
import { InvalidStateError, NotFoundError } from '../../libs/errors/taxonomy.js';
import type { LedgerTransaction, PurchaseLedger } from '../../libs/ledger/PurchaseLedger.js';
import type { NewPurchase, Purchase, PurchaseAttempt } from '../../libs/ledger/purchase.js';
import { systemClock, type Clock } from '../../libs/time/clock.js';
import { KeyedMutex } from './KeyedMutex.js';

/**
 * In-process ledger with the same contract as PgPurchaseLedger: per-purchase
 * exclusion, changes staged inside withPurchaseLock and applied only when the
 * callback resolves.
 */
export class MemoryPurchaseLedger implements PurchaseLedger {
    private readonly purchases = new Map<string, Purchase>();
    private readonly attempts = new Map<string, PurchaseAttempt>();
    private readonly locks = new KeyedMutex();

    /** Committed purchase row updates, for asserting how many transitions happened */
    public committedUpdates = 0;

    constructor(private readonly clock: Clock = systemClock) { }

    public async create(input: NewPurchase): Promise<Purchase> {
        const clash = [...this.purchases.values()].some(
            existing => existing.channelId === input.channelId || existing.gatewayReference === input.gatewayReference
        );
        if (clash || this.attempts.has(input.gatewayReference)) {
            throw new InvalidStateError('Channel id or gateway reference already in use');
        }

        const now = this.clock();
        const purchase: Purchase = {
            id: crypto.randomUUID(),
            gatewayReference: input.gatewayReference,
            channelId: input.channelId,
            state: 'PENDING',
            phoneNumber: input.phoneNumber,
            amount: input.amount,
            currency: input.currency,
            assetRef: input.assetRef,
            retryCount: 0,
            failureReason: null,
            createdAt: now,
            updatedAt: now,
            completedAt: null
        };
        this.purchases.set(purchase.id, purchase);
        this.attempts.set(input.gatewayReference, {
            gatewayReference: input.gatewayReference,
            purchaseId: purchase.id,
            channelId: input.channelId,
            attemptNumber: 1,
            gatewayOutcome: null,
            gatewayAmount: null,
            outcomeReceivedAt: null,
            createdAt: now
        });
        return purchase;
    }

    public async findById(purchaseId: string): Promise<Purchase | null> {
        return this.purchases.get(purchaseId) ?? null;
    }

    public async findByChannelId(channelId: string): Promise<Purchase | null> {
        return [...this.purchases.values()].find(purchase => purchase.channelId === channelId) ?? null;
    }

    public async findAttempt(gatewayReference: string): Promise<PurchaseAttempt | null> {
        return this.attempts.get(gatewayReference) ?? null;
    }

    public async withPurchaseLock<T>(purchaseId: string, work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
        return this.locks.run(purchaseId, async () => {
            const locked = this.purchases.get(purchaseId);
            if (!locked) {
                throw new NotFoundError('Purchase not found');
            }

            let current = locked;
            let updates = 0;
            const stagedAttempts = new Map<string, PurchaseAttempt>();
            const attemptOf = (reference: string) => stagedAttempts.get(reference) ?? this.attempts.get(reference);

            const tx: LedgerTransaction = {
                get purchase() {
                    return current;
                },
                attempt: async (reference) => {
                    const found = attemptOf(reference);
                    return found && found.purchaseId === purchaseId ? found : null;
                },
                update: async (patch) => {
                    await Promise.resolve();
                    current = { ...current, ...patch, updatedAt: this.clock() };
                    updates++;
                    return current;
                },
                openAttempt: async ({ gatewayReference, channelId }) => {
                    if (attemptOf(gatewayReference)) {
                        throw new InvalidStateError('Gateway reference already in use');
                    }
                    const numbers = [...this.attempts.values(), ...stagedAttempts.values()]
                        .filter(attempt => attempt.purchaseId === purchaseId)
                        .map(attempt => attempt.attemptNumber);
                    const attempt: PurchaseAttempt = {
                        gatewayReference,
                        purchaseId,
                        channelId,
                        attemptNumber: Math.max(0, ...numbers) + 1,
                        gatewayOutcome: null,
                        gatewayAmount: null,
                        outcomeReceivedAt: null,
                        createdAt: this.clock()
                    };
                    stagedAttempts.set(gatewayReference, attempt);
                    return attempt;
                },
                recordGatewayOutcome: async (reference, outcome, amount) => {
                    const attempt = attemptOf(reference);
                    if (!attempt || attempt.purchaseId !== purchaseId || attempt.gatewayOutcome !== null) {
                        return;
                    }
                    stagedAttempts.set(reference, {
                        ...attempt,
                        gatewayOutcome: outcome,
                        gatewayAmount: amount,
                        outcomeReceivedAt: this.clock()
                    });
                }
            };

            const result = await work(tx);

            this.purchases.set(purchaseId, current);
            for (const [reference, attempt] of stagedAttempts) {
                this.attempts.set(reference, attempt);
            }
            this.committedUpdates += updates;
            return result;
        });
    }

    public async listAwaitingOutcome(updatedBefore: Date, limit: number): Promise<Purchase[]> {
        return [...this.purchases.values()]
            .filter(purchase => (purchase.state === 'PENDING' || purchase.state === 'TIMED_OUT')
                && purchase.updatedAt.getTime() < updatedBefore.getTime())
            .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
            .slice(0, limit);
    }

    public async findCompletedByPhone(phoneNumber: string, onDate?: string): Promise<Purchase[]> {
        return [...this.purchases.values()]
            .filter(purchase => purchase.phoneNumber === phoneNumber && purchase.state === 'COMPLETED')
            .filter(purchase => onDate === undefined || purchase.createdAt.toISOString().slice(0, 10) === onDate)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    }

    /** Test helper: every attempt of a purchase, oldest first */
    public attemptsOf(purchaseId: string): PurchaseAttempt[] {
        return [...this.attempts.values()]
            .filter(attempt => attempt.purchaseId === purchaseId)
            .sort((a, b) => a.attemptNumber - b.attemptNumber);
    }
}
