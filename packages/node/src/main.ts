/**
 * @roundfeed/node — Entry point.
 *
 * Bootstraps the feed service and Hono app, loads config, starts the HTTP
 * server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseAddressList, parseApiKeys, parseOracles } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import { FeedService } from "./services/feed-service.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
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
    logger.warn("No API keys configured — running in unsecured mode");
  }

  const service = new FeedService(
    {
      address: config.AGGREGATOR_ADDRESS,
      owner: config.OWNER_ADDRESS,
      description: config.DESCRIPTION,
      paymentAmount: config.PAYMENT_AMOUNT,
      rewardRateX10: config.REWARD_RATE_X10,
      validatorTimeoutMs: config.VALIDATOR_TIMEOUT_MS,
      oracles: parseOracles(config.ORACLES),
      readAccessCheck: config.READ_ACCESS_CHECK,
      readers: parseAddressList(config.READ_ACCESS_LIST),
    },
    { logger },
  );
  await service.start();

  const { app } = createApp({
    service,
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
    onUnexpectedError: (err) => {
      logger.error({ err }, "Unhandled error");
    },
    ...(authConfig !== undefined ? { auth: authConfig } : {}),
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
      aggregator: service.aggregator.address,
      oracles: service.roster.oracleCount(),
    },
    "Roundfeed node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await service.stop();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
