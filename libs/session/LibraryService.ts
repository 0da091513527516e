import type { AssetCatalog } from '../catalog/AssetCatalog.js';
import { SessionRequestSchema } from '../checkout/schemas.js';
import { AuthenticationError, InvalidStateError, NotFoundError } from '../errors/taxonomy.js';
import type { PurchaseLedger } from '../ledger/PurchaseLedger.js';
import { normalizePhoneNumber } from '../ledger/phoneNumber.js';
import { validate } from '../validation/zod-middleware.js';
import type { SessionGrant, SessionTokens } from './sessionTokens.js';

export interface LibraryItem {
    readonly purchaseId: string;
    readonly assetRef: string;
    readonly title: string;
    readonly amount: number;
    readonly currency: string;
    readonly completedAt: string | null;
}

export interface LibraryListing {
    readonly phoneNumber: string;
    readonly items: LibraryItem[];
}

const BEARER_PREFIX = /^Bearer\s+/i;

/**
 * Library access for buyers holding a session: the post-payment hand-off and the listing.
 */
export class LibraryService {
    constructor(
        private readonly ledger: PurchaseLedger,
        private readonly sessions: SessionTokens,
        private readonly catalog: AssetCatalog
    ) { }

    /**
     * Issue a session right after a purchase completed, for the buyer who made it.
     * @throws NotFoundError when the purchase is unknown or belongs to another phone number
     * @throws InvalidStateError when the purchase is not COMPLETED
     */
    public async grantForPurchase(input: unknown): Promise<SessionGrant> {
        const request = validate(SessionRequestSchema, input, 'session request');
        const phoneNumber = normalizePhoneNumber(request.phoneNumber);

        const purchase = await this.ledger.findById(request.purchaseId);
        if (!purchase || purchase.phoneNumber !== phoneNumber) {
            throw new NotFoundError('Purchase not found');
        }
        if (purchase.state !== 'COMPLETED') {
            throw new InvalidStateError('Purchase is not completed', purchase.state);
        }

        return this.sessions.issue(purchase.phoneNumber);
    }

    /**
     * @throws AuthenticationError for a missing or invalid bearer session
     */
    public async list(authorization: string | undefined): Promise<LibraryListing> {
        if (!authorization || !BEARER_PREFIX.test(authorization)) {
            throw new AuthenticationError('Missing library session');
        }
        const identity = await this.sessions.verify(authorization.replace(BEARER_PREFIX, '').trim());
        const purchases = await this.ledger.findCompletedByPhone(identity.phoneNumber);

        return {
            phoneNumber: identity.phoneNumber,
            items: purchases.map(purchase => ({
                purchaseId: purchase.id,
                assetRef: purchase.assetRef,
                title: this.catalog.find(purchase.assetRef)?.title ?? purchase.assetRef,
                amount: purchase.amount,
                currency: purchase.currency,
                completedAt: purchase.completedAt?.toISOString() ?? null
            }))
        };
    }
}
