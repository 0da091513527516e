import { ValidationError } from '../errors/taxonomy.js';

const PHONE_PATTERN = /^\+?\d{9,15}$/;

/**
 * Canonical form used for storage and matching: separators stripped, "00" prefix as "+".
 */
export function normalizePhoneNumber(raw: string): string {
    let phone = raw.trim().replace(/[\s\-.()]/g, '');
    if (phone.startsWith('00')) {
        phone = `+${phone.slice(2)}`;
    }
    if (!PHONE_PATTERN.test(phone)) {
        throw new ValidationError('Invalid phone number', [{ path: 'phoneNumber', message: 'Expected 9 to 15 digits' }]);
    }
    return phone;
}
