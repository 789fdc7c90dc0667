import { BusinessClient } from '../core/business/BusinessClient.js';
import { DedupeCache } from '../core/dedupe/DedupeCache.js';
import { buildIngestServer } from '../core/ingest/ingestServer.js';
import { EngineControlClient } from '../core/outbound/EngineControlClient.js';
import { ProfileStore } from '../core/profile/ProfileStore.js';
import { IngestRouter } from '../core/router/IngestRouter.js';
import { loadConfig } from '../infra/config/config.js';
import { Lifecycle } from '../infra/lifecycle.js';
import { createLogger, formatErrorMessage } from '../infra/logger/logger.js';

export async function start(): Promise<void> {
  const cfg = loadConfig();
  const logger = createLogger(cfg);
  const sc = cfg.server;
  logger.info('bootstrap', `Starting ${cfg.app.name} server in ${cfg.app.env}`);

  const lifecycle = new Lifecycle(logger);
  const dedupe = new DedupeCache({ windowMs: sc.dedupeWindowMs });
  const profiles = new ProfileStore({ baseDir: cfg.engine.forward.outFolder, mediaCap: sc.profiles.mediaCap }, logger);
  const engine = new EngineControlClient(sc.engine);
  const business = new BusinessClient(sc.business, logger);

  const router = new IngestRouter(
    { profiles, engine, business, logger },
    {
      windowMs: sc.aggregation.windowMs,
      typingDebounceMs: sc.aggregation.typingDebounceMs,
      reply: sc.reply,
      signal: lifecycle.signal,
    },
  );

  const app = buildIngestServer(
    { router, dedupe, profiles, lifecycle, logger },
    {
      secret: sc.secret,
      requireSignature: sc.requireSignature,
      allowNoSecretDev: sc.allowNoSecretDev,
      bodyLimit: sc.bodyLimit,
      useTimestamp: sc.useTimestamp,
      timestampSkewMs: sc.timestampSkewMs,
    },
  );

  dedupe.start();
  await app.listen({ host: sc.host, port: sc.port });
  logger.info(
    'bootstrap',
    `Ingest listening on ${sc.host}:${sc.port} window_ms=${sc.aggregation.windowMs} require_sig=${sc.requireSignature}`,
  );

  const shutdown = (reason: string) => {
    logger.info('bootstrap', `Received ${reason}, shutting down`);
    lifecycle
      .shutdown({
        reason,
        stop: [{ stop: () => app.close() }, dedupe],
        drain: [() => router.stop()],
        close: [() => profiles.flush()],
      })
      .then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error('bootstrap', `Shutdown failed: ${formatErrorMessage(err)}`);
          process.exit(1);
        },
      );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((err: unknown) => {
  console.error(`[bootstrap] server failed to start: ${formatErrorMessage(err)}`);
  process.exit(1);
});
