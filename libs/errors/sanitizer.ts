import { logger } from '../logging/logger.js';
import crypto from 'crypto';
import { isEngineError, type EngineError } from './taxonomy.js';

/**
 * Error Information Disclosure Prevention
 * Wraps internal errors in a generic message with an incident id for log correlation.
 */

export class InternalError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage);
        this.name = 'InternalError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.sqlState = options?.sqlState;
        this.cause = options?.cause;

        // Log the full internal details with the incident id
        logger.error({
            incidentId: this.incidentId,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Domain errors and already-sanitized errors pass through; anything else is wrapped.
     */
    sanitize: (err: unknown, contextLabel: string): InternalError | EngineError => {
        if (err instanceof InternalError || isEngineError(err)) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let sqlState: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
            sqlState = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        return new InternalError(
            'An internal error occurred. Please try again later.',
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            { cause: err, contextLabel, sqlState }
        );
    }
};
