/**
 * Oracle routes.
 *
 * GET /api/v1/oracles                       — Enabled oracles
 * GET /api/v1/oracles/:address/admin        — An oracle's admin
 * GET /api/v1/oracles/:address/round-state  — Reporting state (accounts only)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { validationFailed } from "../middleware/validate.js";
import { callerOf } from "./caller.js";

export function createOracleRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { roster } = c.get("service");
    const oracles = roster.getOracles().flatMap((address) => {
      const status = roster.getOracle(address);
      return status === undefined ? [] : [status];
    });
    return c.json({ data: toWire(oracles) });
  });

  routes.get("/:address/admin", (c) => {
    const parsed = AddressSchema.safeParse(c.req.param("address"));
    if (!parsed.success) {
      return validationFailed(c, "Invalid oracle address", parsed.error);
    }
    const { aggregator } = c.get("service");
    return c.json({ data: { oracle: parsed.data, admin: aggregator.getAdmin(parsed.data) } });
  });

  routes.get("/:address/round-state", (c) => {
    const parsed = AddressSchema.safeParse(c.req.param("address"));
    if (!parsed.success) {
      return validationFailed(c, "Invalid oracle address", parsed.error);
    }
    const { aggregator } = c.get("service");
    return c.json({
      data: toWire(aggregator.oracleRoundState(callerOf(c.get("auth")), parsed.data)),
    });
  });

  return routes;
}
