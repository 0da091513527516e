import crypto from 'node:crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { RequestContext } from '../context/requestContext.js';

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Origin address of the caller. Honors X-Forwarded-For only when express `trust proxy` is on.
 */
export function originOf(req: Request): string {
    return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

/**
 * Opens the request scope: a request id (reused from the caller when well-formed) and the origin.
 */
export function requestContext(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const presented = req.get(REQUEST_ID_HEADER);
        const requestId = presented && REQUEST_ID_PATTERN.test(presented) ? presented : crypto.randomUUID();
        res.setHeader(REQUEST_ID_HEADER, requestId);
        RequestContext.run({ requestId, origin: originOf(req) }, () => next());
    };
}

/**
 * express 4 does not forward rejected promises; route them to the error middleware.
 */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}

/**
 * Parsed JSON body as a plain record; anything else reads as empty.
 */
export function bodyOf(req: Request): Record<string, unknown> {
    const body: unknown = req.body;
    if (typeof body === 'object' && body !== null && !Array.isArray(body)) {
        return Object.fromEntries(Object.entries(body));
    }
    return {};
}
