import { describe, it, expect, beforeEach } from "vitest";
import { MAX_ROUND_ID } from "@roundfeed/types";
import { InMemoryOracleRoster } from "../src/roster.js";

const ORACLE_A = "0x00000000000000000000000000000000000000aa";
const ORACLE_A_UPPER = "0x00000000000000000000000000000000000000AA";
const ORACLE_B = "0x00000000000000000000000000000000000000bb";
const ADMIN = "0x1000000000000000000000000000000000000001";
const NEW_ADMIN = "0x2000000000000000000000000000000000000002";

describe("InMemoryOracleRoster", () => {
  let roster: InMemoryOracleRoster;

  beforeEach(() => {
    roster = new InMemoryOracleRoster();
    roster.changeOracles({ add: [{ address: ORACLE_A, admin: ADMIN }] });
  });

  it("enables added oracles for every round by default", () => {
    expect(roster.isOracleEnabled(ORACLE_A)).toBe(true);
    expect(roster.oracleCount()).toBe(1);
    expect(roster.getOracle(ORACLE_A)).toMatchObject({
      admin: ADMIN,
      enabled: true,
      startingRound: 1,
      endingRound: MAX_ROUND_ID,
    });
  });

  it("matches addresses regardless of case", () => {
    expect(roster.isOracleEnabled(ORACLE_A_UPPER)).toBe(true);
    expect(roster.getOracles().map((a) => a.toLowerCase())).toEqual([ORACLE_A]);
  });

  it("treats a malformed address as unknown", () => {
    expect(roster.isOracleEnabled("0x1234")).toBe(false);
  });

  it("rejects adding an enabled oracle twice", () => {
    expect(() => roster.changeOracles({ add: [{ address: ORACLE_A, admin: ADMIN }] })).toThrow(
      expect.objectContaining({ code: "ORACLE_EXISTS" }),
    );
  });

  it("rejects removing an oracle that is not enabled", () => {
    expect(() => roster.changeOracles({ remove: [ORACLE_B] })).toThrow(
      expect.objectContaining({ code: "ORACLE_NOT_FOUND" }),
    );
  });

  it("disables removed oracles but keeps their admin", () => {
    roster.changeOracles({ remove: [ORACLE_A], add: [{ address: ORACLE_B, admin: ADMIN }] });

    expect(roster.isOracleEnabled(ORACLE_A)).toBe(false);
    expect(roster.oracleCount()).toBe(1);
    expect(roster.getAdmin(ORACLE_A)).toBe(ADMIN);
  });

  it("refuses to re-add an oracle under a different admin", () => {
    roster.changeOracles({ remove: [ORACLE_A] });

    expect(() => roster.changeOracles({ add: [{ address: ORACLE_A, admin: NEW_ADMIN }] })).toThrow(
      expect.objectContaining({ code: "NOT_ADMIN" }),
    );
  });

  it("caps the roster size", () => {
    const small = new InMemoryOracleRoster(1);
    small.changeOracles({ add: [{ address: ORACLE_A, admin: ADMIN }] });

    expect(() => small.changeOracles({ add: [{ address: ORACLE_B, admin: ADMIN }] })).toThrow(
      expect.objectContaining({ code: "TOO_MANY_ORACLES" }),
    );
    expect(small.oracleCount()).toBe(1);
  });

  it("rejects a starting round after the ending round", () => {
    expect(() =>
      roster.changeOracles({ add: [{ address: ORACLE_B, admin: ADMIN }], startingRound: 5, endingRound: 4 }),
    ).toThrow(expect.objectContaining({ code: "INVALID_CONFIG" }));
    expect(roster.isOracleEnabled(ORACLE_B)).toBe(false);
  });

  describe("admin handover", () => {
    it("moves the admin role in two steps", () => {
      roster.transferAdmin(ORACLE_A, ADMIN, NEW_ADMIN);
      expect(roster.pendingAdmin(ORACLE_A)).toBe(NEW_ADMIN);
      expect(roster.getAdmin(ORACLE_A)).toBe(ADMIN);

      roster.acceptAdmin(ORACLE_A, NEW_ADMIN);

      expect(roster.getAdmin(ORACLE_A)).toBe(NEW_ADMIN);
      expect(roster.pendingAdmin(ORACLE_A)).toBeNull();
    });

    it("only lets the current admin start a handover", () => {
      expect(() => roster.transferAdmin(ORACLE_A, NEW_ADMIN, NEW_ADMIN)).toThrow(
        expect.objectContaining({ code: "NOT_ADMIN" }),
      );
    });

    it("only lets the pending admin accept", () => {
      roster.transferAdmin(ORACLE_A, ADMIN, NEW_ADMIN);

      expect(() => roster.acceptAdmin(ORACLE_A, ADMIN)).toThrow(
        expect.objectContaining({ code: "NOT_ADMIN" }),
      );
    });

    it("fails for an unknown oracle", () => {
      expect(() => roster.getAdmin(ORACLE_B)).toThrow(
        expect.objectContaining({ code: "ORACLE_NOT_FOUND" }),
      );
    });
  });
});
