/**
 * FeedService — Composition root for one price feed.
 *
 * Route handlers delegate to this service; it owns the aggregator and the
 * in-process collaborators the aggregator settles against.
 */

import type { Address, Clock, DataValidator, SubmissionBatch } from "@roundfeed/types";
import {
  Aggregator,
  InMemoryOracleRoster,
  InMemorySettlementToken,
  SimpleReadAccessController,
  sameAddress,
} from "@roundfeed/aggregator";
import type { OracleChange, SubmitResult } from "@roundfeed/aggregator";
import { ReportError, assembleBatch, unpackSignedReport } from "@roundfeed/reporter";
import type { ReportPayload, SignatureParts } from "@roundfeed/reporter";
import type { Logger } from "pino";

// =============================================================================
// Configuration
// =============================================================================

export interface FeedServiceConfig {
  readonly address: Address;
  readonly owner: Address;
  readonly description: string;
  readonly paymentAmount: bigint;
  readonly rewardRateX10?: number | undefined;
  readonly validatorTimeoutMs?: number | undefined;
  /** Roster changes applied in order at startup. */
  readonly oracles?: readonly OracleChange[] | undefined;
  readonly readAccessCheck?: boolean | undefined;
  readonly readers?: readonly Address[] | undefined;
}

export interface FeedServiceDeps {
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
  readonly validator?: DataValidator | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class FeedService {
  readonly aggregator: Aggregator;
  readonly roster: InMemoryOracleRoster;
  readonly token: InMemorySettlementToken;
  readonly access: SimpleReadAccessController;

  private _ready = false;

  constructor(config: FeedServiceConfig, deps: FeedServiceDeps = {}) {
    this.roster = new InMemoryOracleRoster();
    for (const change of config.oracles ?? []) {
      this.roster.changeOracles(change);
    }
    this.token = new InMemorySettlementToken();
    this.access = new SimpleReadAccessController(config.readers ?? [], config.readAccessCheck ?? false);

    this.aggregator = new Aggregator(
      {
        address: config.address,
        owner: config.owner,
        description: config.description,
        paymentAmount: config.paymentAmount,
        rewardRateX10: config.rewardRateX10,
        validatorTimeoutMs: config.validatorTimeoutMs,
      },
      {
        roster: this.roster,
        token: this.token,
        accessController: this.access,
        clock: deps.clock,
        validator: deps.validator,
        logger: deps.logger,
      },
    );
  }

  /**
   * Submit signed reports as packed by each oracle. All reports must carry
   * the same payload; signatures keep their order.
   */
  async submitPacked(sender: Address, reports: readonly string[]): Promise<SubmitResult> {
    const unpacked = reports.map((data) => unpackSignedReport(data));
    const first = unpacked[0];
    if (first === undefined) {
      throw new ReportError("EMPTY_BATCH", "No signed reports supplied");
    }
    for (const [index, { report }] of unpacked.entries()) {
      if (!samePayload(first.report, report)) {
        throw new ReportError("MALFORMED_REPORT", `Report ${String(index)} differs from report 0`);
      }
    }
    const signatures: SignatureParts[] = unpacked.map((u) => u.signature);
    const batch: SubmissionBatch = assembleBatch(first.report, signatures);
    return this.aggregator.submit(sender, batch);
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  /** Pick up any balance already held in custody. */
  async start(): Promise<void> {
    await this.aggregator.updateAvailableFunds();
    this._ready = true;
  }

  isReady(): boolean {
    return this._ready;
  }

  async stop(): Promise<void> {
    this._ready = false;
    await this.aggregator.settleValidations();
  }
}

function samePayload(a: ReportPayload, b: ReportPayload): boolean {
  return (
    a.roundId === b.roundId &&
    sameAddress(a.aggregator, b.aggregator) &&
    a.deadline === b.deadline &&
    a.description === b.description &&
    a.prices.length === b.prices.length &&
    a.prices.every((price, i) => price === b.prices[i])
  );
}
