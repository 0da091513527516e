import crypto from 'node:crypto';

const REFERENCE_PREFIX = 'CR-';

/**
 * New gateway reference: CR- followed by 24 lowercase hex characters.
 */
export function allocateGatewayReference(): string {
    return `${REFERENCE_PREFIX}${crypto.randomBytes(12).toString('hex')}`;
}

/**
 * Opaque broadcaster channel id for server-allocated attempts (retries).
 */
export function allocateChannelId(): string {
    return crypto.randomUUID();
}
