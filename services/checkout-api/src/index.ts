import type { Server } from "node:http";
import { bootstrap, enforceConfiguration } from "../../../libs/bootstrap/startup.js";
import { readDbConnectionConfig } from "../../../libs/bootstrap/config/db-config.js";
import { loadEngineConfig } from "../../../libs/bootstrap/config/engine-config.js";
import { EventBroadcaster } from "../../../libs/broadcast/EventBroadcaster.js";
import { StaticAssetCatalog } from "../../../libs/catalog/AssetCatalog.js";
import { AttemptDispatcher } from "../../../libs/checkout/AttemptDispatcher.js";
import { CheckoutService } from "../../../libs/checkout/CheckoutService.js";
import { RetryCancelController } from "../../../libs/checkout/RetryCancelController.js";
import { createDb } from "../../../libs/db/index.js";
import { createPool } from "../../../libs/db/pool.js";
import { HttpPaymentGateway } from "../../../libs/gateway/HttpPaymentGateway.js";
import { createApp } from "../../../libs/http/app.js";
import { OutcomeApplier } from "../../../libs/ingest/OutcomeApplier.js";
import { PendingExpiryWorker } from "../../../libs/ingest/PendingExpiryWorker.js";
import { WebhookIngestor } from "../../../libs/ingest/WebhookIngestor.js";
import { PgPurchaseLedger } from "../../../libs/ledger/PgPurchaseLedger.js";
import { logger } from "../../../libs/logging/logger.js";
import { AccessRecoveryService } from "../../../libs/recovery/AccessRecoveryService.js";
import { PgAccessAttemptLog } from "../../../libs/recovery/PgAccessAttemptLog.js";
import { LibraryService } from "../../../libs/session/LibraryService.js";
import { SessionTokens } from "../../../libs/session/sessionTokens.js";
import { PurchaseStatusReader } from "../../../libs/status/PurchaseStatusReader.js";
import { StreamingNotifier } from "../../../libs/streaming/StreamingNotifier.js";

const SERVICE_NAME = "checkout-api";

async function main() {
    enforceConfiguration();
    const config = loadEngineConfig();

    const pool = createPool(readDbConnectionConfig());
    const db = createDb(pool);
    await bootstrap(SERVICE_NAME, db);

    const catalog = StaticAssetCatalog.fromFile(config.catalogPath);
    const statusOptions = { successRedirectUrl: config.successRedirectUrl, maxRetries: config.maxRetries };

    // One ledger view per database role.
    const checkoutLedger = new PgPurchaseLedger(db, "relay_checkout");
    const ingestLedger = new PgPurchaseLedger(db, "relay_ingest");
    const recoveryLedger = new PgPurchaseLedger(db, "relay_recovery");

    const statusReader = new PurchaseStatusReader(checkoutLedger, statusOptions);
    const broadcaster = new EventBroadcaster({
        retentionMs: config.channelRetentionMs,
        lookup: channelId => statusReader.settlementForChannel(channelId)
    });
    const applier = new OutcomeApplier(ingestLedger, broadcaster, config.successRedirectUrl);
    const dispatcher = new AttemptDispatcher(
        new HttpPaymentGateway(config.gateway),
        applier,
        catalog,
        config.gateway.callbackUrl
    );
    const sessions = new SessionTokens(config.sessionSecret, config.sessionTtlSeconds);

    const app = createApp({
        checkout: new CheckoutService(checkoutLedger, catalog, dispatcher),
        ingestor: new WebhookIngestor(config.webhookSecret, applier),
        notifier: new StreamingNotifier(broadcaster, {
            awaitTimeoutMs: config.awaitTimeoutMs,
            heartbeatMs: config.streamHeartbeatMs
        }),
        statusReader,
        controller: new RetryCancelController(checkoutLedger, dispatcher, broadcaster, statusOptions),
        recovery: new AccessRecoveryService(new PgAccessAttemptLog(db), sessions, config.recovery),
        library: new LibraryService(recoveryLedger, sessions, catalog),
        trustProxy: config.trustProxy
    });

    const expiryWorker = new PendingExpiryWorker(ingestLedger, applier, {
        expiryMs: config.pendingExpiryMs,
        intervalMs: config.expirySweepIntervalMs
    });
    expiryWorker.start();

    const server: Server = app.listen(config.port, () => {
        logger.info({ port: config.port }, "Checkout API listening");
    });

    let shuttingDown = false;
    const shutdown = (signal: string) => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;
        logger.info({ signal }, "Shutting down");

        expiryWorker.stop();
        server.closeAllConnections();
        server.close(closeError => {
            if (closeError) {
                logger.error({ error: closeError }, "HTTP server close failed");
            }
            pool.end()
                .then(() => process.exit(closeError ? 1 : 0))
                .catch(error => {
                    logger.error({ error }, "Pool shutdown failed");
                    process.exit(1);
                });
        });
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
