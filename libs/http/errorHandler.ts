import type { ErrorRequestHandler } from 'express';
import { ErrorSanitizer, InternalError } from '../errors/sanitizer.js';
import { isEngineError, RateLimitedError } from '../errors/taxonomy.js';
import { getComponentLogger } from '../logging/logger.js';

/**
 * body-parser failures carry an HTTP status and a `type` such as entity.parse.failed.
 */
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
    return err instanceof Error
        && 'status' in err && typeof err.status === 'number'
        && 'type' in err && typeof err.type === 'string';
}

/**
 * Central error middleware.
 * Domain errors map to their status and `{ error: { code, message } }`; everything
 * else is sanitized and answered with a generic message and the incident id.
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
    if (res.headersSent) {
        getComponentLogger('HttpErrorHandler').warn({ path: req.path }, 'Error after response started; closing connection');
        next(err);
        return;
    }

    if (isBodyParserError(err) && err.status < 500) {
        res.status(err.status === 413 ? 413 : 400).json({
            error: { code: 'VALIDATION_FAILED', message: err.status === 413 ? 'Request body too large' : 'Malformed request body' }
        });
        return;
    }

    const sanitized = ErrorSanitizer.sanitize(err, `Http:${req.method} ${req.path}`);

    if (isEngineError(sanitized)) {
        if (sanitized instanceof RateLimitedError) {
            res.setHeader('Retry-After', String(sanitized.retryAfterSeconds));
        }
        res.status(sanitized.statusCode).json(sanitized.toJSON());
        return;
    }

    const internal: InternalError = sanitized;
    res.status(500).json({
        error: {
            code: 'INTERNAL_ERROR',
            message: internal.publicMessage,
            incidentId: internal.incidentId
        }
    });
};
