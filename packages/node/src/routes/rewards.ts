/**
 * Submitter reward routes.
 *
 * GET  /api/v1/rewards/:address         — Vesting record and withdrawable amount
 * POST /api/v1/rewards/:address/unlock  — Pay out everything vested so far
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { validationFailed } from "../middleware/validate.js";

export function createRewardRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:address", (c) => {
    const parsed = AddressSchema.safeParse(c.req.param("address"));
    if (!parsed.success) {
      return validationFailed(c, "Invalid submitter address", parsed.error);
    }
    const { aggregator } = c.get("service");
    return c.json({
      data: toWire({
        ...aggregator.vestingOf(parsed.data),
        withdrawable: aggregator.withdrawableRewards(parsed.data),
      }),
    });
  });

  routes.post("/:address/unlock", async (c) => {
    const parsed = AddressSchema.safeParse(c.req.param("address"));
    if (!parsed.success) {
      return validationFailed(c, "Invalid submitter address", parsed.error);
    }
    const { aggregator } = c.get("service");

    const amount = await aggregator.unlockSubmitterRewards(parsed.data);

    return c.json({ data: toWire({ submitter: parsed.data, amount }) });
  });

  return routes;
}
