import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

const LevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const BucketSchema = (intervalMs: number, burst: number) =>
  z
    .object({
      intervalMs: z.number().int().positive().default(intervalMs),
      burst: z.number().int().positive().default(burst),
    })
    .default({});

const AppConfigSchema = z.object({
  app: z
    .object({
      name: z.string().default('chatbridge'),
      env: z.enum(['dev', 'prod', 'test']).default('prod'),
    })
    .default({}),
  logging: z
    .object({
      level: LevelSchema.default('info'),
      color: z.boolean().default(true),
      format: z.enum(['pretty', 'json']).default('pretty'),
    })
    .default({}),
  engine: z
    .object({
      gateway: z
        .object({
          port: z.number().int().positive().default(6090),
          path: z.string().default('/'),
          token: z.string().optional(),
          callTimeoutMs: z.number().int().positive().default(15_000),
        })
        .default({}),
      http: z.object({ port: z.number().int().positive().default(8080) }).default({}),
      history: z.object({ dir: z.string().default('./data/history') }).default({}),
      enableStatus: z.boolean().default(false),
      receiptDedupeMs: z.number().int().positive().default(5000),
      forward: z
        .object({
          mode: z.enum(['folder', 'off']).default('folder'),
          outFolder: z.string().default('outbox'),
          maxBytes: z.number().int().default(0),
          extra: z.record(z.unknown()).default({}),
          webhook: z
            .object({
              enabled: z.boolean().default(false),
              url: z.string().default(''),
              secret: z.string().optional(),
              headers: z.record(z.string()).default({}),
            })
            .default({}),
        })
        .default({}),
      rateLimits: z
        .object({
          text: BucketSchema(50, 5),
          media: BucketSchema(150, 2),
          status: BucketSchema(500, 1),
        })
        .default({}),
    })
    .default({}),
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().positive().default(8090),
      secret: z.string().optional(),
      requireSignature: z.boolean().default(true),
      allowNoSecretDev: z.boolean().default(false),
      bodyLimit: z.number().int().positive().default(1_048_576),
      useTimestamp: z.boolean().default(false),
      timestampSkewMs: z.number().int().positive().default(300_000),
      dedupeWindowMs: z.number().int().positive().default(600_000),
      engine: z
        .object({
          sendUrl: z.string().default('http://127.0.0.1:8080/api/send'),
          typingUrl: z.string().default('http://127.0.0.1:8080/api/typing'),
          markReadUrl: z.string().default('http://127.0.0.1:8080/api/markread'),
        })
        .default({}),
      business: z
        .object({
          url: z.string().default('http://localhost:3000/api/chat/message'),
          channel: z.string().default('whatsapp'),
          timeoutMs: z.number().int().positive().default(15_000),
        })
        .default({}),
      aggregation: z
        .object({
          windowMs: z.number().int().positive().default(3000),
          typingDebounceMs: z.number().int().nonnegative().default(700),
        })
        .default({}),
      reply: z
        .object({
          preReplyDelayMs: z.number().int().nonnegative().default(0),
          baseWaitMs: z.number().int().nonnegative().default(800),
          perCharMs: z.number().int().nonnegative().default(35),
          jitterMs: z.number().int().nonnegative().default(400),
          maxWaitMs: z.number().int().nonnegative().default(4000),
          typingPauseMs: z.number().int().nonnegative().default(300),
        })
        .default({}),
      profiles: z
        .object({ mediaCap: z.number().int().positive().default(200) })
        .default({}),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LogLevel = z.infer<typeof LevelSchema>;

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawConfig, ...keys: string[]): RawConfig {
  let current = raw;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }
  return current;
}

/**
 * Environment variables win over the YAML file for secrets and endpoints,
 * so a committed default.yaml never needs to carry them.
 */
function applyEnvOverrides(raw: RawConfig, env: NodeJS.ProcessEnv): void {
  if (env.NODE_ENV === 'dev' || env.NODE_ENV === 'prod' || env.NODE_ENV === 'test') {
    section(raw, 'app').env = env.NODE_ENV;
  }
  if (env.LOG_LEVEL) section(raw, 'logging').level = env.LOG_LEVEL;
  if (env.GATEWAY_TOKEN) section(raw, 'engine', 'gateway').token = env.GATEWAY_TOKEN;
  if (env.OUTBOX_BASE) section(raw, 'engine', 'forward').outFolder = env.OUTBOX_BASE;
  if (env.WEBHOOK_URL) section(raw, 'engine', 'forward', 'webhook').url = env.WEBHOOK_URL;
  if (env.WEBHOOK_SECRET) {
    section(raw, 'engine', 'forward', 'webhook').secret = env.WEBHOOK_SECRET;
    section(raw, 'server').secret = env.WEBHOOK_SECRET;
  }
  if (env.BUSINESS_URL) section(raw, 'server', 'business').url = env.BUSINESS_URL;
}

/**
 * Parse a raw (already YAML-decoded) configuration object.
 * Throws a ZodError when a value has the wrong shape.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): AppConfig {
  const base: RawConfig = isRecord(raw) ? structuredClone(raw) : {};
  applyEnvOverrides(base, env);
  return AppConfigSchema.parse(base);
}

let cachedConfig: AppConfig | null = null;

export function loadConfig(filePath?: string): AppConfig {
  if (cachedConfig && !filePath) return cachedConfig;
  const target = filePath ?? process.env.CONFIG_PATH ?? resolve(process.cwd(), 'config', 'default.yaml');
  const raw: unknown = parse(readFileSync(target, 'utf-8'));
  const cfg = parseConfig(raw, process.env);

  if (cfg.engine.forward.webhook.enabled && !cfg.engine.forward.webhook.url) {
    console.warn('[CONFIG] Webhook forwarding enabled without a URL. Disabling webhook.');
    cfg.engine.forward.webhook.enabled = false;
  }

  cachedConfig = cfg;
  return cfg;
}
