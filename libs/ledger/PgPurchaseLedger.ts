import type { DbClient, TxClient } from '../db/index.js';
import type { DbRole } from '../db/roles.js';
import { isUniqueViolation } from '../db/errors.js';
import { InvalidStateError, NotFoundError } from '../errors/taxonomy.js';
import type { LedgerTransaction, PurchaseLedger } from './PurchaseLedger.js';
import {
    PURCHASE_STATES,
    type GatewayOutcome,
    type NewPurchase,
    type Purchase,
    type PurchaseAttempt,
    type PurchasePatch,
    type PurchaseState
} from './purchase.js';

export interface PurchaseRow {
    id: string;
    gateway_reference: string;
    channel_id: string;
    state: string;
    phone_number: string;
    amount: string | number;
    currency: string;
    asset_ref: string;
    retry_count: number;
    failure_reason: string | null;
    created_at: Date;
    updated_at: Date;
    completed_at: Date | null;
}

interface AttemptRow {
    gateway_reference: string;
    purchase_id: string;
    channel_id: string;
    attempt_number: number;
    gateway_outcome: string | null;
    gateway_amount: string | number | null;
    outcome_received_at: Date | null;
    created_at: Date;
}

const PURCHASE_COLUMNS = `id, gateway_reference, channel_id, state, phone_number, amount, currency,
    asset_ref, retry_count, failure_reason, created_at, updated_at, completed_at`;

const ATTEMPT_COLUMNS = `gateway_reference, purchase_id, channel_id, attempt_number, gateway_outcome,
    gateway_amount, outcome_received_at, created_at`;

function toPurchaseState(value: string): PurchaseState {
    const state = PURCHASE_STATES.find(candidate => candidate === value);
    if (!state) {
        throw new Error(`Unknown purchase state in ledger: ${value}`);
    }
    return state;
}

function toGatewayOutcome(value: string | null): GatewayOutcome | null {
    if (value === null) return null;
    if (value === 'SUCCESS' || value === 'FAILED') return value;
    throw new Error(`Unknown gateway outcome in ledger: ${value}`);
}

export function mapPurchaseRow(row: PurchaseRow): Purchase {
    return {
        id: row.id,
        gatewayReference: row.gateway_reference,
        channelId: row.channel_id,
        state: toPurchaseState(row.state),
        phoneNumber: row.phone_number,
        amount: Number(row.amount),
        currency: row.currency,
        assetRef: row.asset_ref,
        retryCount: row.retry_count,
        failureReason: row.failure_reason,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
        completedAt: row.completed_at
    };
}

export function mapAttemptRow(row: AttemptRow): PurchaseAttempt {
    return {
        gatewayReference: row.gateway_reference,
        purchaseId: row.purchase_id,
        channelId: row.channel_id,
        attemptNumber: row.attempt_number,
        gatewayOutcome: toGatewayOutcome(row.gateway_outcome),
        gatewayAmount: row.gateway_amount === null ? null : Number(row.gateway_amount),
        outcomeReceivedAt: row.outcome_received_at,
        createdAt: row.created_at
    };
}

function firstRow<T>(rows: T[], context: string): T {
    const row = rows[0];
    if (!row) {
        throw new Error(`${context} returned no rows`);
    }
    return row;
}

/**
 * PostgreSQL Purchase Ledger
 *
 * Per-purchase exclusion is a row lock (SELECT ... FOR UPDATE) held for the
 * duration of the work callback; two concurrent callbacks for the same purchase
 * run one after the other, the second seeing the first one's committed row.
 */
export class PgPurchaseLedger implements PurchaseLedger {
    constructor(
        private readonly db: DbClient,
        private readonly role: DbRole,
        private readonly readRole: DbRole = 'relay_readonly'
    ) { }

    public async create(input: NewPurchase): Promise<Purchase> {
        try {
            return await this.db.transactionAsRole(this.role, async (tx) => {
                const inserted = await tx.query<PurchaseRow>(
                    `INSERT INTO purchases (
                        gateway_reference, channel_id, state, phone_number, amount, currency, asset_ref,
                        retry_count, created_at, updated_at
                    ) VALUES ($1, $2, 'PENDING', $3, $4, $5, $6, 0, NOW(), NOW())
                    RETURNING ${PURCHASE_COLUMNS}`,
                    [input.gatewayReference, input.channelId, input.phoneNumber, input.amount, input.currency, input.assetRef]
                );
                const purchase = mapPurchaseRow(firstRow(inserted.rows, 'Purchase insert'));

                await insertAttempt(tx, purchase.id, input.gatewayReference, input.channelId);
                return purchase;
            });
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new InvalidStateError('Channel id or gateway reference already in use');
            }
            throw error;
        }
    }

    public async findById(purchaseId: string): Promise<Purchase | null> {
        const result = await this.db.queryAsRole<PurchaseRow>(
            this.readRole,
            `SELECT ${PURCHASE_COLUMNS} FROM purchases WHERE id = $1 LIMIT 1`,
            [purchaseId]
        );
        const row = result.rows[0];
        return row ? mapPurchaseRow(row) : null;
    }

    public async findByChannelId(channelId: string): Promise<Purchase | null> {
        const result = await this.db.queryAsRole<PurchaseRow>(
            this.readRole,
            `SELECT ${PURCHASE_COLUMNS} FROM purchases WHERE channel_id = $1 LIMIT 1`,
            [channelId]
        );
        const row = result.rows[0];
        return row ? mapPurchaseRow(row) : null;
    }

    public async findAttempt(gatewayReference: string): Promise<PurchaseAttempt | null> {
        const result = await this.db.queryAsRole<AttemptRow>(
            this.readRole,
            `SELECT ${ATTEMPT_COLUMNS} FROM purchase_attempts WHERE gateway_reference = $1 LIMIT 1`,
            [gatewayReference]
        );
        const row = result.rows[0];
        return row ? mapAttemptRow(row) : null;
    }

    public async withPurchaseLock<T>(purchaseId: string, work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
        return this.db.transactionAsRole(this.role, async (tx) => {
            const locked = await tx.query<PurchaseRow>(
                `SELECT ${PURCHASE_COLUMNS} FROM purchases WHERE id = $1 FOR UPDATE`,
                [purchaseId]
            );
            const row = locked.rows[0];
            if (!row) {
                throw new NotFoundError('Purchase not found');
            }

            let current = mapPurchaseRow(row);

            const ledgerTx: LedgerTransaction = {
                get purchase() {
                    return current;
                },

                attempt: async (gatewayReference) => {
                    const found = await tx.query<AttemptRow>(
                        `SELECT ${ATTEMPT_COLUMNS} FROM purchase_attempts
                         WHERE gateway_reference = $1 AND purchase_id = $2 LIMIT 1`,
                        [gatewayReference, current.id]
                    );
                    const attemptRow = found.rows[0];
                    return attemptRow ? mapAttemptRow(attemptRow) : null;
                },

                update: async (patch) => {
                    current = await updatePurchase(tx, current.id, patch);
                    return current;
                },

                openAttempt: async ({ gatewayReference, channelId }) =>
                    insertAttempt(tx, current.id, gatewayReference, channelId),

                recordGatewayOutcome: async (gatewayReference, outcome, amount) => {
                    await tx.query(
                        `UPDATE purchase_attempts
                         SET gateway_outcome = $3, gateway_amount = $4, outcome_received_at = NOW()
                         WHERE gateway_reference = $1 AND purchase_id = $2 AND gateway_outcome IS NULL`,
                        [gatewayReference, current.id, outcome, amount]
                    );
                }
            };

            return work(ledgerTx);
        });
    }

    public async listAwaitingOutcome(updatedBefore: Date, limit: number): Promise<Purchase[]> {
        const result = await this.db.queryAsRole<PurchaseRow>(
            this.readRole,
            `SELECT ${PURCHASE_COLUMNS} FROM purchases
             WHERE state IN ('PENDING', 'TIMED_OUT') AND updated_at < $1
             ORDER BY updated_at ASC
             LIMIT $2`,
            [updatedBefore, limit]
        );
        return result.rows.map(mapPurchaseRow);
    }

    public async findCompletedByPhone(phoneNumber: string, onDate?: string): Promise<Purchase[]> {
        const { text, params } = completedByPhoneQuery(phoneNumber, onDate);
        const result = await this.db.queryAsRole<PurchaseRow>(this.readRole, text, params);
        return result.rows.map(mapPurchaseRow);
    }
}

/**
 * COMPLETED purchases of a phone number, newest first, optionally on one UTC calendar date.
 * Shared with callers that must run it on a connection they already hold.
 */
export function completedByPhoneQuery(phoneNumber: string, onDate?: string): { text: string; params: unknown[] } {
    const params: unknown[] = [phoneNumber];
    let dateClause = '';
    if (onDate !== undefined) {
        params.push(onDate);
        dateClause = `AND (created_at AT TIME ZONE 'UTC')::date = $2::date`;
    }
    return {
        text: `SELECT ${PURCHASE_COLUMNS} FROM purchases
             WHERE phone_number = $1 AND state = 'COMPLETED' ${dateClause}
             ORDER BY created_at DESC`,
        params
    };
}
