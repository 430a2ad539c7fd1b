/**
 * Submission routes.
 *
 * POST /api/v1/submissions         — Submit a quorum-signed batch
 * POST /api/v1/submissions/packed  — Submit the oracles' packed signed reports
 *
 * The authenticated address is the submitter credited with the reward.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SubmitBatchSchema, SubmitPackedSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createSubmissionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("submit"), validateBody(SubmitBatchSchema), async (c) => {
    const service = c.get("service");
    const batch = c.get("validatedBody");

    const result = await service.aggregator.submit(c.get("auth").address, batch);

    return c.json({ data: toWire(result) }, 201);
  });

  routes.post("/packed", requirePermission("submit"), validateBody(SubmitPackedSchema), async (c) => {
    const service = c.get("service");
    const { reports } = c.get("validatedBody");

    const result = await service.submitPacked(c.get("auth").address, reports);

    return c.json({ data: toWire(result) }, 201);
  });

  return routes;
}
