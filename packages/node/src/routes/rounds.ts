/**
 * Round read routes.
 *
 * GET /api/v1/rounds/latest          — Latest round id, answer and timestamp
 * GET /api/v1/rounds/latest/data     — Latest round data (gated)
 * GET /api/v1/rounds/:id             — Round data plus raw submissions (gated)
 * GET /api/v1/rounds/:id/data        — Round data (gated)
 * GET /api/v1/rounds/:id/answer      — Answer and timestamp, zero when unanswered
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RoundIdParamSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { validationFailed } from "../middleware/validate.js";
import { callerOf } from "./caller.js";

export function createRoundRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/latest", (c) => {
    const { aggregator } = c.get("service");
    return c.json({
      data: toWire({
        roundId: aggregator.latestRound(),
        answer: aggregator.latestAnswer(),
        updatedAt: aggregator.latestTimestamp(),
      }),
    });
  });

  routes.get("/latest/data", (c) => {
    const { aggregator } = c.get("service");
    return c.json({ data: toWire(aggregator.latestRoundData(callerOf(c.get("auth")))) });
  });

  routes.get("/:id", (c) => {
    const parsed = RoundIdParamSchema.safeParse(c.req.param("id"));
    if (!parsed.success) {
      return validationFailed(c, "Invalid round id", parsed.error);
    }
    const { aggregator } = c.get("service");
    const round = aggregator.getRoundData(callerOf(c.get("auth")), parsed.data);
    return c.json({
      data: toWire({ ...round, submissions: aggregator.getSubmissions(parsed.data) }),
    });
  });

  routes.get("/:id/data", (c) => {
    const parsed = RoundIdParamSchema.safeParse(c.req.param("id"));
    if (!parsed.success) {
      return validationFailed(c, "Invalid round id", parsed.error);
    }
    const { aggregator } = c.get("service");
    return c.json({ data: toWire(aggregator.getRoundData(callerOf(c.get("auth")), parsed.data)) });
  });

  routes.get("/:id/answer", (c) => {
    const parsed = RoundIdParamSchema.safeParse(c.req.param("id"));
    if (!parsed.success) {
      return validationFailed(c, "Invalid round id", parsed.error);
    }
    const { aggregator } = c.get("service");
    return c.json({
      data: toWire({
        roundId: parsed.data,
        answer: aggregator.getAnswer(parsed.data),
        updatedAt: aggregator.getTimestamp(parsed.data),
      }),
    });
  });

  return routes;
}
