/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - Permission guard (allowed, denied)
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import { hasPermission } from "../../src/types/auth.js";
import { authMiddleware, requirePermission } from "../../src/middleware/auth.js";

const OWNER = "0x2000000000000000000000000000000000000002";
const READER = "0x5000000000000000000000000000000000000005";

const KEYS: readonly ApiKeyRecord[] = [
  { key: "owner-key", role: "owner", address: OWNER, kind: "account" },
  { key: "reporter-key", role: "reporter", address: OWNER, kind: "account" },
  { key: "viewer-key", role: "viewer", address: READER, kind: "contract" },
];

function makeApp() {
  const app = new Hono<AppEnv>();
  app.use("*", authMiddleware({ apiKeys: new Map(KEYS.map((k): [string, ApiKeyRecord] => [k.key, k])) }));
  app.get("/test", (c) => c.json({ auth: c.get("auth") }));
  app.get("/admin-only", requirePermission("admin"), (c) => c.json({ ok: true }));
  app.get("/submit-only", requirePermission("submit"), (c) => c.json({ ok: true }));
  return app;
}

function get(path: string, key?: string): Request {
  return new Request(`http://localhost${path}`, key === undefined ? {} : { headers: { "X-Api-Key": key } });
}

describe("API Key auth", () => {
  it("resolves the key's caller identity", async () => {
    const res = await makeApp().request(get("/test", "viewer-key"));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      auth: { type: "api-key", identity: "viewer-key", role: "viewer", address: READER, kind: "contract" },
    });
  });

  it("returns 401 for an invalid API key", async () => {
    const res = await makeApp().request(get("/test", "wrong-key"));

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: { code: "UNAUTHORIZED", message: "Invalid API key" } });
  });

  it("returns 401 when no auth is provided", async () => {
    const res = await makeApp().request(get("/test"));

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: { code: "UNAUTHORIZED", message: "Authentication required" } });
  });
});

describe("permission guard", () => {
  it("allows the owner to access admin-only routes", async () => {
    const res = await makeApp().request(get("/admin-only", "owner-key"));

    expect(res.status).toBe(200);
  });

  it("denies a reporter from admin-only routes", async () => {
    const res = await makeApp().request(get("/admin-only", "reporter-key"));

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: { code: "FORBIDDEN", message: "Role 'reporter' lacks 'admin' permission" },
    });
  });

  it("allows a reporter to submit", async () => {
    const res = await makeApp().request(get("/submit-only", "reporter-key"));

    expect(res.status).toBe(200);
  });

  it("denies a viewer from submitting", async () => {
    const res = await makeApp().request(get("/submit-only", "viewer-key"));

    expect(res.status).toBe(403);
  });
});

describe("hasPermission", () => {
  it("follows the role hierarchy", () => {
    expect(hasPermission("viewer", "read")).toBe(true);
    expect(hasPermission("viewer", "fund")).toBe(true);
    expect(hasPermission("viewer", "submit")).toBe(false);
    expect(hasPermission("reporter", "submit")).toBe(true);
    expect(hasPermission("reporter", "admin")).toBe(false);
    expect(hasPermission("owner", "admin")).toBe(true);
  });
});
