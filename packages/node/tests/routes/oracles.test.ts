/**
 * Oracle routes: roster listing, admin lookup and reporting state.
 */

import { describe, it, expect } from "vitest";
import { MAX_ROUND_ID } from "@roundfeed/types";
import { ADMIN, READER, createTestNode, firstRound, jsonRequest, reporter } from "../setup.js";

describe("GET /api/v1/oracles", () => {
  it("lists the enabled oracles", async () => {
    const { app } = await createTestNode();

    const res = await app.request(jsonRequest("/api/v1/oracles", "GET", undefined, "viewer-key"));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: [0, 1, 2].map((i) => ({
        address: reporter(i).address,
        admin: ADMIN,
        enabled: true,
        startingRound: 1,
        endingRound: MAX_ROUND_ID,
      })),
    });
  });
});

describe("GET /api/v1/oracles/:address/admin", () => {
  it("returns the oracle's admin", async () => {
    const { app } = await createTestNode();
    const oracle = reporter(0).address;

    const res = await app.request(jsonRequest(`/api/v1/oracles/${oracle}/admin`, "GET", undefined, "viewer-key"));

    expect(await res.json()).toEqual({ data: { oracle, admin: ADMIN } });
  });

  it("accepts a lowercase address", async () => {
    const { app } = await createTestNode();
    const oracle = reporter(0).address;

    const res = await app.request(
      jsonRequest(`/api/v1/oracles/${oracle.toLowerCase()}/admin`, "GET", undefined, "viewer-key"),
    );

    expect(await res.json()).toEqual({ data: { oracle, admin: ADMIN } });
  });

  it("returns 404 ORACLE_NOT_FOUND for an unknown oracle", async () => {
    const { app } = await createTestNode();

    const res = await app.request(jsonRequest(`/api/v1/oracles/${READER}/admin`, "GET", undefined, "viewer-key"));

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: { code: "ORACLE_NOT_FOUND" } });
  });
});

describe("GET /api/v1/oracles/:address/round-state", () => {
  it("reports the next round for an eligible oracle", async () => {
    const { app } = await createTestNode();
    await app.request(jsonRequest("/api/v1/submissions", "POST", await firstRound(), "reporter-key"));

    const res = await app.request(
      jsonRequest(`/api/v1/oracles/${reporter(2).address}/round-state`, "GET", undefined, "viewer-key"),
    );

    expect(await res.json()).toEqual({
      data: {
        eligibleToSubmit: true,
        roundId: 2,
        latestAnswer: "150",
        availableFunds: "980",
        oracleCount: 3,
        paymentAmount: "10",
      },
    });
  });

  it("reports an unknown address as ineligible", async () => {
    const { app } = await createTestNode();

    const res = await app.request(jsonRequest(`/api/v1/oracles/${READER}/round-state`, "GET", undefined, "viewer-key"));

    expect(await res.json()).toMatchObject({ data: { eligibleToSubmit: false, roundId: 1 } });
  });

  it("returns 403 UNAUTHORIZED_READER to a contract caller", async () => {
    const { app } = await createTestNode();

    const res = await app.request(
      jsonRequest(`/api/v1/oracles/${reporter(0).address}/round-state`, "GET", undefined, "contract-key"),
    );

    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({ error: { code: "UNAUTHORIZED_READER" } });
  });
});
