import { GatewayServer } from '../adapter/gateway/GatewayServer.js';
import { Engine } from '../core/engine/Engine.js';
import { buildControlApi } from '../core/engine/controlApi.js';
import { WebhookForwarder } from '../core/forward/WebhookForwarder.js';
import { FolderSink } from '../core/sink/FolderSink.js';
import { HistoryStore } from '../core/storage/HistoryStore.js';
import { loadConfig } from '../infra/config/config.js';
import { Lifecycle } from '../infra/lifecycle.js';
import { createLogger, formatErrorMessage } from '../infra/logger/logger.js';

export async function start(): Promise<void> {
  const cfg = loadConfig();
  const logger = createLogger(cfg);
  const ec = cfg.engine;
  logger.info('bootstrap', `Starting ${cfg.app.name} engine in ${cfg.app.env}`);

  const lifecycle = new Lifecycle(logger);

  const history = new HistoryStore(ec.history.dir, logger);
  await history.initialize();

  const sink = ec.forward.mode === 'folder' ? new FolderSink({ baseDir: ec.forward.outFolder, maxBytes: ec.forward.maxBytes }) : null;
  const webhook = ec.forward.webhook.enabled
    ? new WebhookForwarder(
        {
          url: ec.forward.webhook.url,
          secret: ec.forward.webhook.secret,
          headers: ec.forward.webhook.headers,
          signal: lifecycle.signal,
        },
        logger,
      )
    : null;
  if (!webhook) logger.info('bootstrap', 'Webhook forwarding disabled');

  const gateway = new GatewayServer(
    {
      port: ec.gateway.port,
      path: ec.gateway.path,
      token: ec.gateway.token,
      callTimeoutMs: ec.gateway.callTimeoutMs,
    },
    logger,
  );

  const engine = new Engine(
    { client: gateway, logger, sink, webhook, history },
    {
      rateLimits: ec.rateLimits,
      extraParams: ec.forward.extra,
      enableStatus: ec.enableStatus,
      receiptDedupeMs: ec.receiptDedupeMs,
      signal: lifecycle.signal,
    },
  );

  const api = buildControlApi(engine, logger, { isReady: () => gateway.connected });

  await gateway.start();
  engine.start();
  await api.listen({ host: '0.0.0.0', port: ec.http.port });
  logger.info('bootstrap', `Control API listening on :${ec.http.port}`);

  const shutdown = (reason: string) => {
    logger.info('bootstrap', `Received ${reason}, shutting down`);
    lifecycle
      .shutdown({
        reason,
        stop: [{ stop: () => api.close() }, engine],
        drain: [
          (timeoutMs) => engine.drain(timeoutMs),
          (timeoutMs) => webhook?.drain(timeoutMs) ?? Promise.resolve(true),
          () => sink?.drain() ?? Promise.resolve(),
        ],
        close: [() => gateway.stop()],
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
  console.error(`[bootstrap] engine failed to start: ${formatErrorMessage(err)}`);
  process.exit(1);
});
