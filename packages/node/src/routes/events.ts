/**
 * Event query route.
 *
 * GET /api/v1/events?fromSequence=&maxCount=&type=  — Committed aggregator events
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { validationFailed } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return validationFailed(c, "Invalid query parameters", queryResult.error);
    }

    const { events } = c.get("service").aggregator;
    const query = queryResult.data;
    const page = events.read({
      fromSequence: query.fromSequence,
      maxCount: query.maxCount,
      type: query.type,
    });

    return c.json({
      data: toWire(page),
      lastSequence: events.lastSequence(),
    });
  });

  return routes;
}
