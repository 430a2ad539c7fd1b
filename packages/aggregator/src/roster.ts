/**
 * In-memory oracle roster.
 *
 * Holds every oracle ever added. Removal disables an oracle instead of
 * forgetting it, so its admin stays readable. Addresses are checksummed on
 * entry and compared case-insensitively.
 */

import type { Address, OracleRoster, OracleStatus } from "@roundfeed/types";
import { MAX_ROUND_ID, isAddress } from "@roundfeed/types";
import { normalizeAddress } from "./address.js";
import { AggregatorError } from "./types.js";

export const MAX_ORACLE_COUNT = 77;

export interface OracleAddition {
  readonly address: string;
  readonly admin: string;
}

export interface OracleChange {
  readonly remove?: readonly string[] | undefined;
  readonly add?: readonly OracleAddition[] | undefined;
  /** First round added oracles may report for. Default 1. */
  readonly startingRound?: number | undefined;
  /** Last round added oracles may report for. Default MAX_ROUND_ID. */
  readonly endingRound?: number | undefined;
}

interface OracleEntry extends OracleStatus {
  readonly pendingAdmin: Address | null;
}

export class InMemoryOracleRoster implements OracleRoster {
  private readonly _oracles = new Map<Address, OracleEntry>();
  private readonly _maxOracles: number;

  constructor(maxOracles: number = MAX_ORACLE_COUNT) {
    this._maxOracles = maxOracles;
  }

  // ─── OracleRoster ────────────────────────────────────────────────────

  isOracleEnabled(address: Address): boolean {
    return this.find(address)?.enabled ?? false;
  }

  oracleCount(): number {
    let count = 0;
    for (const entry of this._oracles.values()) {
      if (entry.enabled) count++;
    }
    return count;
  }

  getOracle(address: Address): OracleStatus | undefined {
    const entry = this.find(address);
    if (entry === undefined) return undefined;
    const { pendingAdmin: _pending, ...status } = entry;
    return status;
  }

  getOracles(): readonly Address[] {
    return [...this._oracles.values()].filter((o) => o.enabled).map((o) => o.address);
  }

  // ─── Administration ──────────────────────────────────────────────────

  /**
   * Remove, then add. The whole change is validated before anything moves.
   */
  changeOracles(change: OracleChange): void {
    const removals = (change.remove ?? []).map((a) => normalizeAddress(a, "oracle"));
    const additions = (change.add ?? []).map((o) => ({
      address: normalizeAddress(o.address, "oracle"),
      admin: normalizeAddress(o.admin, "admin"),
    }));
    const startingRound = change.startingRound ?? 1;
    const endingRound = change.endingRound ?? MAX_ROUND_ID;

    if (startingRound > endingRound) {
      throw new AggregatorError(
        "INVALID_CONFIG",
        `startingRound ${String(startingRound)} is after endingRound ${String(endingRound)}`,
      );
    }

    for (const address of removals) {
      if (this._oracles.get(address)?.enabled !== true) {
        throw new AggregatorError("ORACLE_NOT_FOUND", `Oracle ${address} is not enabled`);
      }
    }

    const removed = new Set(removals);
    const seen = new Set<Address>();
    for (const { address, admin } of additions) {
      const existing = this._oracles.get(address);
      if (seen.has(address) || (existing?.enabled === true && !removed.has(address))) {
        throw new AggregatorError("ORACLE_EXISTS", `Oracle ${address} is already enabled`);
      }
      if (existing !== undefined && existing.admin !== admin) {
        throw new AggregatorError("NOT_ADMIN", `Oracle ${address} keeps its admin ${existing.admin}`);
      }
      seen.add(address);
    }

    const resulting = this.oracleCount() - removals.length + additions.length;
    if (resulting > this._maxOracles) {
      throw new AggregatorError(
        "TOO_MANY_ORACLES",
        `Roster would hold ${String(resulting)} oracles, max ${String(this._maxOracles)}`,
      );
    }

    for (const address of removals) {
      const entry = this._oracles.get(address);
      if (entry !== undefined) {
        this._oracles.set(address, { ...entry, enabled: false });
      }
    }
    for (const { address, admin } of additions) {
      const existing = this._oracles.get(address);
      this._oracles.set(address, {
        address,
        admin,
        enabled: true,
        startingRound,
        endingRound,
        pendingAdmin: existing?.pendingAdmin ?? null,
      });
    }
  }

  getAdmin(oracle: Address): Address {
    const entry = this.find(oracle);
    if (entry === undefined) {
      throw new AggregatorError("ORACLE_NOT_FOUND", `Unknown oracle ${oracle}`);
    }
    return entry.admin;
  }

  /**
   * First step of a two-step admin handover, called by the current admin.
   */
  transferAdmin(oracle: Address, caller: Address, newAdmin: Address): void {
    const entry = this.require(oracle);
    if (normalizeAddress(caller, "caller") !== entry.admin) {
      throw new AggregatorError("NOT_ADMIN", `${caller} is not the admin of ${entry.address}`);
    }
    this._oracles.set(entry.address, {
      ...entry,
      pendingAdmin: normalizeAddress(newAdmin, "newAdmin"),
    });
  }

  /**
   * Second step, called by the proposed admin.
   */
  acceptAdmin(oracle: Address, caller: Address): void {
    const entry = this.require(oracle);
    const accepting = normalizeAddress(caller, "caller");
    if (entry.pendingAdmin !== accepting) {
      throw new AggregatorError("NOT_ADMIN", `${caller} is not the pending admin of ${entry.address}`);
    }
    this._oracles.set(entry.address, { ...entry, admin: accepting, pendingAdmin: null });
  }

  pendingAdmin(oracle: Address): Address | null {
    return this.require(oracle).pendingAdmin;
  }

  private find(address: string): OracleEntry | undefined {
    if (!isAddress(address)) return undefined;
    return this._oracles.get(normalizeAddress(address));
  }

  private require(address: Address): OracleEntry {
    const entry = this.find(address);
    if (entry === undefined) {
      throw new AggregatorError("ORACLE_NOT_FOUND", `Unknown oracle ${address}`);
    }
    return entry;
  }
}
