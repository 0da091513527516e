import { InternalError } from '../errors/sanitizer.js';

const UNIQUE_VIOLATION = '23505';

/**
 * True for a unique-constraint violation, raw from pg or already sanitized by the db layer.
 */
export function isUniqueViolation(error: unknown): boolean {
    if (error instanceof InternalError) {
        return error.sqlState === UNIQUE_VIOLATION;
    }
    return typeof error === 'object'
        && error !== null
        && 'code' in error
        && error.code === UNIQUE_VIOLATION;
}
