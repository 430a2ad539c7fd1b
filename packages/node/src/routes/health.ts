/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (feed started and accepting calls)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { FeedService } from "../services/feed-service.js";

export function createHealthRoutes(service: FeedService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady();
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        description: service.aggregator.description,
        latestRound: service.aggregator.latestRound(),
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
