/**
 * Submission routes: signed batches and packed reports.
 */

import { describe, it, expect } from "vitest";
import { Reporter } from "@roundfeed/reporter";
import {
  AGGREGATOR,
  DESCRIPTION,
  NOW,
  SUBMITTER,
  createTestNode,
  firstRound,
  jsonRequest,
  reporter,
  testKey,
  wireBatch,
} from "../setup.js";

describe("POST /api/v1/submissions", () => {
  it("answers round 1 and pays the signers", async () => {
    const { app, service } = await createTestNode();

    const res = await app.request(jsonRequest("/api/v1/submissions", "POST", await firstRound(), "reporter-key"));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      data: {
        roundId: 1,
        answer: "150",
        updatedAt: NOW,
        signers: [reporter(0).address, reporter(1).address],
        paid: "20",
        submitterReward: "2",
      },
    });
    expect(service.aggregator.availableFunds()).toBe(980n);
    expect(service.aggregator.allocatedFunds()).toBe(20n);
    expect(service.aggregator.vestingOf(SUBMITTER).remainVesting).toBe(2n);
  });

  it("returns 403 for a role without submit permission", async () => {
    const { app, service } = await createTestNode();

    const res = await app.request(jsonRequest("/api/v1/submissions", "POST", await firstRound(), "viewer-key"));

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: { code: "FORBIDDEN", message: "Role 'viewer' lacks 'submit' permission" },
    });
    expect(service.aggregator.latestRound()).toBe(0);
  });

  it("returns 422 QUORUM_NOT_MET for one signer of three", async () => {
    const { app, service } = await createTestNode();
    const batch = await wireBatch([reporter(0)], { roundId: 1, prices: [100n], deadline: NOW + 60 });

    const res = await app.request(jsonRequest("/api/v1/submissions", "POST", batch, "reporter-key"));

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ error: { code: "QUORUM_NOT_MET" } });
    expect(service.aggregator.latestRound()).toBe(0);
    expect(service.aggregator.availableFunds()).toBe(1000n);
  });

  it("returns 409 NON_SEQUENTIAL_ROUND for a skipped round", async () => {
    const { app } = await createTestNode();
    const batch = await wireBatch([reporter(0), reporter(1)], { roundId: 2, prices: [1n, 2n], deadline: NOW + 60 });

    const res = await app.request(jsonRequest("/api/v1/submissions", "POST", batch, "reporter-key"));

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ error: { code: "NON_SEQUENTIAL_ROUND" } });
  });

  it("returns 422 EXPIRED_BATCH after the deadline", async () => {
    const { app, clock } = await createTestNode();
    const batch = await firstRound();
    clock.set(NOW + 61);

    const res = await app.request(jsonRequest("/api/v1/submissions", "POST", batch, "reporter-key"));

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ error: { code: "EXPIRED_BATCH" } });
  });

  it("returns 403 UNAUTHORIZED_SUBMITTER when a signer is not an oracle", async () => {
    const { app } = await createTestNode();
    const outsider = new Reporter({ privateKey: testKey(99), aggregator: AGGREGATOR, description: DESCRIPTION });
    const batch = await wireBatch([reporter(0), outsider], { roundId: 1, prices: [1n, 2n], deadline: NOW + 60 });

    const res = await app.request(jsonRequest("/api/v1/submissions", "POST", batch, "reporter-key"));

    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({ error: { code: "UNAUTHORIZED_SUBMITTER" } });
  });

  it("returns 400 MALFORMED_BATCH for a short signature word", async () => {
    const { app } = await createTestNode();
    const batch = { ...(await firstRound()), r: ["0x12", "0x34"] };

    const res = await app.request(jsonRequest("/api/v1/submissions", "POST", batch, "reporter-key"));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "MALFORMED_BATCH" } });
  });

  it("returns 400 VALIDATION_ERROR for a fractional price", async () => {
    const { app } = await createTestNode();
    const batch = { ...(await firstRound()), prices: ["1.5", "2"] };

    const res = await app.request(jsonRequest("/api/v1/submissions", "POST", batch, "reporter-key"));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request body validation failed",
        details: { issues: [{ path: "prices.0", message: "must be a decimal integer string" }] },
      },
    });
  });

  it("returns 400 VALIDATION_ERROR for a body that is not JSON", async () => {
    const { app } = await createTestNode();

    const res = await app.request("/api/v1/submissions", {
      method: "POST",
      headers: { "Content-Type": "application/json", "X-Api-Key": "reporter-key" },
      body: "{not json",
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "VALIDATION_ERROR", message: "Invalid JSON in request body" },
    });
  });

  it("credits the X-Caller-Address header when auth is off", async () => {
    const { app, service } = await createTestNode({ secured: false });

    const res = await app.request(
      jsonRequest("/api/v1/submissions", "POST", await firstRound(), undefined, { "X-Caller-Address": SUBMITTER }),
    );

    expect(res.status).toBe(201);
    expect(service.aggregator.vestingOf(SUBMITTER).remainVesting).toBe(2n);
  });

  it("rejects a malformed X-Caller-Address header", async () => {
    const { app } = await createTestNode({ secured: false });

    const res = await app.request(
      jsonRequest("/api/v1/rounds/latest", "GET", undefined, undefined, { "X-Caller-Address": "someone" }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { code: "VALIDATION_ERROR", message: "Invalid X-Caller-Address header" },
    });
  });
});

describe("POST /api/v1/submissions/packed", () => {
  const observation = { roundId: 1, prices: [101n, 99n, 100n], deadline: NOW + 60 };

  it("assembles packed reports into a batch", async () => {
    const { app } = await createTestNode();
    const reports = await Promise.all([0, 1, 2].map((i) => reporter(i).signPacked(observation)));

    const res = await app.request(jsonRequest("/api/v1/submissions/packed", "POST", { reports }, "reporter-key"));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      data: {
        roundId: 1,
        answer: "100",
        updatedAt: NOW,
        signers: [reporter(0).address, reporter(1).address, reporter(2).address],
        paid: "30",
        submitterReward: "3",
      },
    });
  });

  it("returns 400 MALFORMED_REPORT when reports disagree", async () => {
    const { app } = await createTestNode();
    const reports = [
      await reporter(0).signPacked({ roundId: 1, prices: [1n, 2n], deadline: NOW + 60 }),
      await reporter(1).signPacked({ roundId: 1, prices: [1n, 3n], deadline: NOW + 60 }),
    ];

    const res = await app.request(jsonRequest("/api/v1/submissions/packed", "POST", { reports }, "reporter-key"));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "MALFORMED_REPORT", message: "Report 1 differs from report 0" },
    });
  });

  it("returns 400 MALFORMED_REPORT for a blob that is too short", async () => {
    const { app } = await createTestNode();

    const res = await app.request(
      jsonRequest("/api/v1/submissions/packed", "POST", { reports: ["0x1234"] }, "reporter-key"),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "MALFORMED_REPORT" } });
  });

  it("returns 400 VALIDATION_ERROR for no reports", async () => {
    const { app } = await createTestNode();

    const res = await app.request(jsonRequest("/api/v1/submissions/packed", "POST", { reports: [] }, "reporter-key"));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "VALIDATION_ERROR" } });
  });
});
