import { SignJWT, jwtVerify, errors as joseErrors } from 'jose';
import { AuthenticationError } from '../errors/taxonomy.js';
import { getComponentLogger, maskPhone } from '../logging/logger.js';

const SESSION_ISSUER = 'checkout-relay';
const SESSION_AUDIENCE = 'library';
const SESSION_SCOPE = 'library';
const CLOCK_TOLERANCE_SECONDS = 30;

export interface SessionGrant {
    readonly token: string;
    readonly phoneNumber: string;
    readonly expiresAt: Date;
}

export interface LibraryIdentity {
    readonly phoneNumber: string;
    readonly expiresAt: Date;
}

/**
 * Library session tokens.
 *
 * A session is bound to the buyer's phone number, not to one purchase, so a buyer
 * holding several purchases sees all of them under one grant.
 */
export class SessionTokens {
    private readonly key: Uint8Array;

    constructor(secret: string, private readonly ttlSeconds: number) {
        this.key = new TextEncoder().encode(secret);
    }

    public async issue(phoneNumber: string, now: Date = new Date()): Promise<SessionGrant> {
        const issuedAt = Math.floor(now.getTime() / 1000);
        const expiresAtSeconds = issuedAt + this.ttlSeconds;

        const token = await new SignJWT({ scope: SESSION_SCOPE })
            .setProtectedHeader({ alg: 'HS256' })
            .setSubject(phoneNumber)
            .setIssuer(SESSION_ISSUER)
            .setAudience(SESSION_AUDIENCE)
            .setIssuedAt(issuedAt)
            .setExpirationTime(expiresAtSeconds)
            .sign(this.key);

        getComponentLogger('SessionTokens').info(
            { phone: maskPhone(phoneNumber), expiresAt: new Date(expiresAtSeconds * 1000).toISOString() },
            'Library session issued'
        );

        return { token, phoneNumber, expiresAt: new Date(expiresAtSeconds * 1000) };
    }

    /**
     * @throws AuthenticationError for any token that is malformed, expired, or not a library session
     */
    public async verify(token: string, now: Date = new Date()): Promise<LibraryIdentity> {
        try {
            const { payload } = await jwtVerify(token, this.key, {
                issuer: SESSION_ISSUER,
                audience: SESSION_AUDIENCE,
                clockTolerance: CLOCK_TOLERANCE_SECONDS,
                currentDate: now,
                requiredClaims: ['sub', 'exp', 'iat'],
                algorithms: ['HS256']
            });

            if (payload.scope !== SESSION_SCOPE || typeof payload.sub !== 'string' || typeof payload.exp !== 'number') {
                throw new AuthenticationError('Invalid library session');
            }

            return { phoneNumber: payload.sub, expiresAt: new Date(payload.exp * 1000) };
        } catch (error) {
            if (error instanceof AuthenticationError) {
                throw error;
            }
            const reason = error instanceof joseErrors.JOSEError ? error.code : 'UNKNOWN';
            getComponentLogger('SessionTokens').warn({ reason }, 'Library session rejected');
            throw new AuthenticationError('Invalid library session');
        }
    }
}
