import crypto from 'node:crypto';

export const SIGNATURE_HEADER = 'x-gateway-signature';
export const SECRET_HEADER = 'x-gateway-secret';

export function computeSignature(secret: string, rawBody: Buffer | string): string {
    return crypto.createHmac('sha256', secret).update(rawBody).digest('hex');
}

function constantTimeEquals(a: string, b: string): boolean {
    const left = Buffer.from(a, 'utf8');
    const right = Buffer.from(b, 'utf8');
    if (left.length !== right.length) {
        return false;
    }
    return crypto.timingSafeEqual(left, right);
}

export interface CallbackCredentials {
    readonly signature?: string;
    readonly sharedSecret?: string;
}

/**
 * A callback is authentic when it carries the HMAC-SHA256 of its exact body, hex encoded,
 * or the shared secret itself for gateways that cannot sign.
 */
export function isAuthenticCallback(secret: string, rawBody: Buffer, credentials: CallbackCredentials): boolean {
    if (credentials.signature) {
        const presented = credentials.signature.trim().toLowerCase().replace(/^sha256=/, '');
        return constantTimeEquals(presented, computeSignature(secret, rawBody));
    }
    if (credentials.sharedSecret) {
        return constantTimeEquals(credentials.sharedSecret, secret);
    }
    return false;
}
