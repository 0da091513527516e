import express, { type Express } from 'express';
import type { CheckoutService } from '../checkout/CheckoutService.js';
import type { RetryCancelController } from '../checkout/RetryCancelController.js';
import { ChannelIdSchema, PurchaseIdSchema, RecoveryRequestSchema } from '../checkout/schemas.js';
import { NotFoundError } from '../errors/taxonomy.js';
import { SECRET_HEADER, SIGNATURE_HEADER } from '../gateway/signature.js';
import type { WebhookIngestor } from '../ingest/WebhookIngestor.js';
import type { AccessRecoveryService } from '../recovery/AccessRecoveryService.js';
import type { LibraryService } from '../session/LibraryService.js';
import type { PurchaseStatusReader } from '../status/PurchaseStatusReader.js';
import type { StreamingNotifier } from '../streaming/StreamingNotifier.js';
import { validate } from '../validation/zod-middleware.js';
import { errorHandler } from './errorHandler.js';
import { asyncHandler, bodyOf, originOf, requestContext } from './middleware.js';

export interface AppDependencies {
    readonly checkout: CheckoutService;
    readonly ingestor: WebhookIngestor;
    readonly notifier: StreamingNotifier;
    readonly statusReader: PurchaseStatusReader;
    readonly controller: RetryCancelController;
    readonly recovery: AccessRecoveryService;
    readonly library: LibraryService;
    readonly trustProxy: boolean;
}

const JSON_LIMIT = '16kb';
const WEBHOOK_LIMIT = '64kb';

export function createApp(deps: AppDependencies): Express {
    const app = express();
    app.disable('x-powered-by');
    app.set('trust proxy', deps.trustProxy);

    app.use(requestContext());

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok' });
    });

    // Raw body: the signature covers the exact bytes the gateway sent.
    app.post(
        '/api/webhooks/gateway',
        express.raw({ type: () => true, limit: WEBHOOK_LIMIT }),
        asyncHandler(async (req, res) => {
            const rawBody: unknown = req.body;
            const ack = await deps.ingestor.ingest({
                rawBody: Buffer.isBuffer(rawBody) ? rawBody : Buffer.alloc(0),
                signature: req.get(SIGNATURE_HEADER),
                sharedSecret: req.get(SECRET_HEADER)
            });
            res.status(200).json(ack);
        })
    );

    app.use('/api', express.json({ limit: JSON_LIMIT }));

    app.post('/api/checkout', asyncHandler(async (req, res) => {
        const result = await deps.checkout.initiate(bodyOf(req));
        res.status(201).json(result);
    }));

    app.get('/api/purchases/stream/:channelId', asyncHandler(async (req, res) => {
        const channelId = validate(ChannelIdSchema, req.params.channelId, 'channel id');

        res.status(200);
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache, no-transform');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');
        res.flushHeaders();

        const disconnect = new AbortController();
        res.on('close', () => disconnect.abort());

        await deps.notifier.serve(channelId, {
            write: chunk => {
                res.write(chunk);
            },
            end: () => {
                res.end();
            }
        }, disconnect.signal);
    }));

    app.get('/api/purchases/:id/status', asyncHandler(async (req, res) => {
        const purchaseId = validate(PurchaseIdSchema, req.params.id, 'purchase id');
        const view = await deps.statusReader.status(purchaseId);
        res.setHeader('Cache-Control', 'no-store');
        res.json(view);
    }));

    app.post('/api/purchases/:id/retry', asyncHandler(async (req, res) => {
        const result = await deps.controller.retry({ ...bodyOf(req), purchaseId: req.params.id });
        res.json(result);
    }));

    app.post('/api/purchases/:id/cancel', asyncHandler(async (req, res) => {
        res.json(await deps.controller.cancel(req.params.id));
    }));

    app.post('/api/purchases/:id/timeout', asyncHandler(async (req, res) => {
        res.json(await deps.controller.reportTimeout(req.params.id));
    }));

    app.post('/api/purchases/:id/session', asyncHandler(async (req, res) => {
        const grant = await deps.library.grantForPurchase({ ...bodyOf(req), purchaseId: req.params.id });
        res.status(201).json({ token: grant.token, expiresAt: grant.expiresAt.toISOString() });
    }));

    app.post('/api/access/recover', asyncHandler(async (req, res) => {
        const request = validate(RecoveryRequestSchema, bodyOf(req), 'recovery request');
        const grant = await deps.recovery.recover({ ...request, origin: originOf(req) });
        res.json({
            token: grant.session.token,
            expiresAt: grant.session.expiresAt.toISOString(),
            purchaseId: grant.purchaseId
        });
    }));

    app.get('/api/library', asyncHandler(async (req, res) => {
        res.setHeader('Cache-Control', 'no-store');
        res.json(await deps.library.list(req.get('authorization')));
    }));

    app.use((req, _res, next) => {
        next(new NotFoundError(`No route for ${req.method} ${req.path}`));
    });

    app.use(errorHandler);

    return app;
}
