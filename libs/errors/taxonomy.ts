/**
 * Engine error taxonomy.
 *
 * Every error a caller may see carries a stable code and the HTTP status the
 * transport layer answers with. Anything outside this set is an internal error
 * and goes through ErrorSanitizer before it leaves the process.
 */

export type EngineErrorCode =
    | 'VALIDATION_FAILED'
    | 'AUTHENTICATION_FAILED'
    | 'NOT_FOUND'
    | 'INVALID_STATE'
    | 'RATE_LIMITED'
    | 'GATEWAY_UNAVAILABLE';

export abstract class EngineError extends Error {
    abstract readonly code: EngineErrorCode;
    abstract readonly statusCode: number;

    toJSON(): { error: { code: EngineErrorCode; message: string } } {
        return {
            error: {
                code: this.code,
                message: this.message
            }
        };
    }
}

/**
 * Malformed input (body shape, phone number, channel id).
 */
export class ValidationError extends EngineError {
    readonly code = 'VALIDATION_FAILED';
    readonly statusCode = 400;

    constructor(
        message: string,
        public readonly issues: ReadonlyArray<{ path: string; message: string }> = [],
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'ValidationError';
    }
}

/**
 * Bad webhook secret/signature or an invalid library session.
 */
export class AuthenticationError extends EngineError {
    readonly code = 'AUTHENTICATION_FAILED';
    readonly statusCode = 401;

    constructor(message = 'Authentication failed') {
        super(message);
        this.name = 'AuthenticationError';
    }
}

export class NotFoundError extends EngineError {
    readonly code = 'NOT_FOUND';
    readonly statusCode = 404;

    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

/**
 * Operation not valid for the purchase's current state.
 */
export class InvalidStateError extends EngineError {
    readonly code = 'INVALID_STATE';
    readonly statusCode = 409;

    constructor(message: string, public readonly currentState?: string) {
        super(message);
        this.name = 'InvalidStateError';
    }
}

/**
 * Recovery lockout. retryAfterMs is the time until the oldest counted attempt leaves the window.
 */
export class RateLimitedError extends EngineError {
    readonly code = 'RATE_LIMITED';
    readonly statusCode = 429;

    constructor(public readonly retryAfterMs: number, message = 'Too many attempts. Please try again later.') {
        super(message);
        this.name = 'RateLimitedError';
    }

    get retryAfterSeconds(): number {
        return Math.max(1, Math.ceil(this.retryAfterMs / 1000));
    }
}

/**
 * Transport failure talking to the payment gateway.
 */
export class GatewayUnavailableError extends EngineError {
    readonly code = 'GATEWAY_UNAVAILABLE';
    readonly statusCode = 502;

    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'GatewayUnavailableError';
    }
}

export function isEngineError(err: unknown): err is EngineError {
    return err instanceof EngineError;
}
