/**
 * @keepsake/node — Entry point.
 *
 * Loads config, starts the HTTP server and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, running in unsecured mode (X-Caller-Id)");
  }

  const { app, service } = createApp({
    serviceConfig: {
      currency: config.CURRENCY,
      decimals: config.DECIMALS,
      escrowAccount: config.ESCROW_ACCOUNT,
      eventLogPath: config.EVENT_LOG_PATH,
      statePath: config.STATE_PATH,
      logger,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
    onUnexpectedError: (err, c) => {
      logger.error({ err, path: c.req.path }, "Unhandled error");
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    auth: authConfig,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      currency: config.CURRENCY,
      eventLog: config.EVENT_LOG_PATH ?? null,
      stateFile: config.STATE_PATH ?? null,
    },
    "Keepsake node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      let exitCode = 0;
      try {
        service.saveState();
      } catch (err) {
        logger.error({ err }, "Failed to save state");
        exitCode = 1;
      }
      service.stop();
      logger.info("Shutdown complete");
      process.exit(exitCode);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
