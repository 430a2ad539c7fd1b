/**
 * Funds routes.
 *
 * GET  /api/v1/funds              — Available, allocated, accumulator, payment
 * POST /api/v1/funds/deposits     — Pull approved tokens from the caller
 * POST /api/v1/funds/withdrawals  — Owner only: send unallocated funds out
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DepositSchema, WithdrawalSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createFundsRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { aggregator } = c.get("service");
    return c.json({
      data: toWire({ ...aggregator.fundsView(), paymentAmount: aggregator.paymentAmount }),
    });
  });

  routes.post("/deposits", requirePermission("fund"), validateBody(DepositSchema), async (c) => {
    const { aggregator } = c.get("service");
    const { amount } = c.get("validatedBody");

    const available = await aggregator.addFunds(c.get("auth").address, amount);

    return c.json({ data: toWire({ amount, available }) }, 201);
  });

  routes.post("/withdrawals", requirePermission("admin"), validateBody(WithdrawalSchema), async (c) => {
    const { aggregator } = c.get("service");
    const { recipient, amount } = c.get("validatedBody");

    const available = await aggregator.withdrawFunds(c.get("auth").address, recipient, amount);

    return c.json({ data: toWire({ recipient, amount, available }) }, 201);
  });

  return routes;
}
