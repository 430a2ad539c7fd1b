/**
 * Shared fixtures: placeholder oracle keys, a funded aggregator and a
 * batch signer built on viem accounts.
 */

import type { Address, Hex, SubmissionBatch } from "@roundfeed/types";
import type { PrivateKeyAccount } from "viem/accounts";
import { privateKeyToAccount } from "viem/accounts";
import { hexToNumber, slice } from "viem";
import { Aggregator } from "../src/aggregator.js";
import { ManualClock } from "../src/clock.js";
import { InMemoryOracleRoster } from "../src/roster.js";
import { buildReportHash } from "../src/signature.js";
import { InMemorySettlementToken } from "../src/token.js";
import type { AggregatorConfig, AggregatorDeps } from "../src/types.js";

export const AGGREGATOR: Address = "0x1000000000000000000000000000000000000001";
export const OWNER: Address = "0x2000000000000000000000000000000000000002";
export const FUNDER: Address = "0x3000000000000000000000000000000000000003";
export const SUBMITTER: Address = "0x4000000000000000000000000000000000000004";
export const READER: Address = "0x5000000000000000000000000000000000000005";
export const ADMIN: Address = "0x6000000000000000000000000000000000000006";

export const DESCRIPTION = "ETH / USD";
export const START = 1_700_000_000;

export function testKey(n: number): Hex {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

export const ORACLES: readonly PrivateKeyAccount[] = [1, 2, 3].map((n) => privateKeyToAccount(testKey(n)));
export const OUTSIDER: PrivateKeyAccount = privateKeyToAccount(testKey(99));

export function oracle(index: number): PrivateKeyAccount {
  const account = ORACLES[index];
  if (account === undefined) {
    throw new Error(`No test oracle at index ${String(index)}`);
  }
  return account;
}

/**
 * Every signer signs the same report; signatures appear in signer order.
 */
export async function signBatch(
  signers: readonly PrivateKeyAccount[],
  batch: { roundId: number; prices: readonly bigint[]; deadline: number },
  aggregator: Address = AGGREGATOR,
  description: string = DESCRIPTION,
): Promise<SubmissionBatch> {
  const hash = buildReportHash({ ...batch, aggregator, description });
  const signatures = await Promise.all(signers.map((s) => s.signMessage({ message: { raw: hash } })));
  return {
    roundId: batch.roundId,
    prices: batch.prices,
    deadline: batch.deadline,
    r: signatures.map((sig) => slice(sig, 0, 32)),
    s: signatures.map((sig) => slice(sig, 32, 64)),
    v: signatures.map((sig) => hexToNumber(slice(sig, 64, 65))),
  };
}

export interface Harness {
  readonly aggregator: Aggregator;
  readonly clock: ManualClock;
  readonly roster: InMemoryOracleRoster;
  readonly token: InMemorySettlementToken;
}

/**
 * Three enabled oracles, payment 10, optionally a funded pool.
 */
export async function createHarness(
  options: {
    pool?: bigint;
    config?: Partial<AggregatorConfig>;
    deps?: Partial<AggregatorDeps>;
  } = {},
): Promise<Harness> {
  const clock = new ManualClock(START);
  const roster = new InMemoryOracleRoster();
  roster.changeOracles({ add: ORACLES.map((o) => ({ address: o.address, admin: ADMIN })) });
  const token = new InMemorySettlementToken();

  const aggregator = new Aggregator(
    {
      address: AGGREGATOR,
      owner: OWNER,
      description: DESCRIPTION,
      paymentAmount: 10n,
      ...options.config,
    },
    { roster, token, clock, ...options.deps },
  );

  const pool = options.pool ?? 1000n;
  if (pool > 0n) {
    token.mint(FUNDER, pool);
    token.approve(FUNDER, AGGREGATOR, pool);
    await aggregator.addFunds(FUNDER, pool);
  }

  return { aggregator, clock, roster, token };
}
