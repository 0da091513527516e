import type { DbClient } from '../db/index.js';
import type { DbRole } from '../db/roles.js';
import { completedByPhoneQuery, mapPurchaseRow, type PurchaseRow } from '../ledger/PgPurchaseLedger.js';
import type { AccessAttemptLog, AccessAttemptScope, AccessIdentity, WindowCount } from './accessAttempts.js';

interface WindowRow {
    count: string | number;
    oldest_at: Date | null;
}

export function identityLockKey(identity: AccessIdentity): string {
    return `access:${identity.phoneNumber}|${identity.origin}`;
}

/**
 * PostgreSQL Access Attempt Log
 * Identity exclusion is a transaction-scoped advisory lock on a hash of (phone, origin).
 * Every query of the scope, the purchase lookup included, runs on the locking connection.
 */
export class PgAccessAttemptLog implements AccessAttemptLog {
    constructor(
        private readonly db: DbClient,
        private readonly role: DbRole = 'relay_recovery'
    ) { }

    public async withIdentityLock<T>(
        identity: AccessIdentity,
        work: (scope: AccessAttemptScope) => Promise<T>
    ): Promise<T> {
        return this.db.transactionAsRole(this.role, async (tx) => {
            await tx.query('SELECT pg_advisory_xact_lock(hashtext($1))', [identityLockKey(identity)]);

            const scope: AccessAttemptScope = {
                countSince: async (since): Promise<WindowCount> => {
                    const result = await tx.query<WindowRow>(
                        `SELECT COUNT(*) AS count, MIN(attempted_at) AS oldest_at
                         FROM access_attempts
                         WHERE phone_normalized = $1 AND origin = $2
                           AND outcome IN ('SUCCESS', 'NO_MATCH')
                           AND attempted_at > $3`,
                        [identity.phoneNumber, identity.origin, since]
                    );
                    const row = result.rows[0];
                    return {
                        count: row ? Number(row.count) : 0,
                        oldestAt: row?.oldest_at ?? null
                    };
                },

                append: async (record) => {
                    await tx.query(
                        `INSERT INTO access_attempts (
                            phone_submitted, phone_normalized, origin, outcome, matched_purchase_id, attempted_at
                        ) VALUES ($1, $2, $3, $4, $5, $6)`,
                        [
                            record.submittedPhone,
                            record.phoneNumber,
                            record.origin,
                            record.outcome,
                            record.matchedPurchaseId,
                            record.attemptedAt
                        ]
                    );
                },

                findCompletedPurchases: async (onDate) => {
                    const { text, params } = completedByPhoneQuery(identity.phoneNumber, onDate);
                    const result = await tx.query<PurchaseRow>(text, params);
                    return result.rows.map(mapPurchaseRow);
                }
            };

            return work(scope);
        });
    }
}
