import { NotFoundError, RateLimitedError, ValidationError } from '../errors/taxonomy.js';
import { normalizePhoneNumber } from '../ledger/phoneNumber.js';
import { getComponentLogger, maskPhone } from '../logging/logger.js';
import type { SessionGrant, SessionTokens } from '../session/sessionTokens.js';
import { systemClock, type Clock } from '../time/clock.js';
import type { AccessAttemptLog } from './accessAttempts.js';

export interface RecoveryPolicy {
    readonly windowMs: number;
    readonly maxAttempts: number;
}

export interface RecoveryRequest {
    readonly phoneNumber: string;
    /** Calendar date of the purchase, YYYY-MM-DD */
    readonly purchaseDate: string;
    readonly origin: string;
}

export interface RecoveryGrant {
    readonly session: SessionGrant;
    readonly purchaseId: string;
}

type AttemptDecision =
    | { kind: 'LOCKED'; retryAfterMs: number }
    | { kind: 'NO_MATCH' }
    | { kind: 'MATCHED'; purchaseId: string; phoneNumber: string };

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Accepts YYYY-MM-DD naming a real calendar day.
 */
export function parsePurchaseDate(raw: string): string {
    const match = DATE_PATTERN.exec(raw.trim());
    if (!match) {
        throw new ValidationError('Purchase date must be formatted as YYYY-MM-DD');
    }
    const iso = `${match[1]}-${match[2]}-${match[3]}`;
    const parsed = new Date(`${iso}T00:00:00.000Z`);
    if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== iso) {
        throw new ValidationError('Purchase date is not a valid calendar date');
    }
    return iso;
}

/**
 * Access Recovery
 *
 * Re-grants library access from (phone, purchase date) under a sliding window of
 * attempts per (phone, origin). The window check runs before any ledger lookup, and
 * every attempt is written to the audit log before the caller gets an answer.
 */
export class AccessRecoveryService {
    private readonly logger = getComponentLogger('AccessRecoveryService');

    constructor(
        private readonly attempts: AccessAttemptLog,
        private readonly sessions: SessionTokens,
        private readonly policy: RecoveryPolicy,
        private readonly clock: Clock = systemClock
    ) { }

    /**
     * @throws RateLimitedError when the identity is locked out
     * @throws NotFoundError when no COMPLETED purchase matches
     */
    public async recover(request: RecoveryRequest): Promise<RecoveryGrant> {
        const phoneNumber = normalizePhoneNumber(request.phoneNumber);
        const purchaseDate = parsePurchaseDate(request.purchaseDate);
        const identity = { phoneNumber, origin: request.origin };

        // Decide and audit inside the lock; errors are raised after the audit row commits.
        const decision = await this.attempts.withIdentityLock(identity, async (scope): Promise<AttemptDecision> => {
            const now = this.clock();
            const window = await scope.countSince(new Date(now.getTime() - this.policy.windowMs));

            if (window.count >= this.policy.maxAttempts) {
                await scope.append({
                    submittedPhone: request.phoneNumber,
                    phoneNumber,
                    origin: request.origin,
                    outcome: 'LOCKED',
                    matchedPurchaseId: null,
                    attemptedAt: now
                });
                const releaseAt = (window.oldestAt?.getTime() ?? now.getTime()) + this.policy.windowMs;
                return { kind: 'LOCKED', retryAfterMs: Math.max(1, releaseAt - now.getTime()) };
            }

            const matches = await scope.findCompletedPurchases(purchaseDate);
            const match = matches[0];

            await scope.append({
                submittedPhone: request.phoneNumber,
                phoneNumber,
                origin: request.origin,
                outcome: match ? 'SUCCESS' : 'NO_MATCH',
                matchedPurchaseId: match?.id ?? null,
                attemptedAt: now
            });

            return match
                ? { kind: 'MATCHED', purchaseId: match.id, phoneNumber: match.phoneNumber }
                : { kind: 'NO_MATCH' };
        });

        const logContext = { phone: maskPhone(phoneNumber), origin: request.origin };

        switch (decision.kind) {
            case 'LOCKED':
                this.logger.warn({ ...logContext, retryAfterMs: decision.retryAfterMs }, 'Access recovery locked out');
                throw new RateLimitedError(decision.retryAfterMs);
            case 'NO_MATCH':
                this.logger.info(logContext, 'Access recovery found no matching purchase');
                throw new NotFoundError('No completed purchase matches that phone number and date');
            case 'MATCHED': {
                const session = await this.sessions.issue(decision.phoneNumber, this.clock());
                this.logger.info({ ...logContext, purchaseId: decision.purchaseId }, 'Access recovered');
                return { session, purchaseId: decision.purchaseId };
            }
        }
    }
}
