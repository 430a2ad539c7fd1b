/**
 * Aggregator — the submission entry point.
 *
 * Composes:
 * - Quorum gate: deadline, batch shape, threshold
 * - Signature verifier: report hash and signer recovery
 * - RoundLedger: sequential rounds with carry-forward
 * - FundsLedger: available vs. allocated pool
 * - VestingLedger: submitter rewards
 *
 * Every mutating call is queued on one serial executor. A submission is
 * validated first (including async signature recovery), then committed
 * in one synchronous section with every ledger checkpointed; if anything
 * in the commit throws, all ledgers are rolled back and no event is
 * emitted.
 */

import type {
  Address,
  AggregatorEvent,
  Caller,
  Clock,
  DataValidator,
  OracleRoster,
  ReadAccessController,
  RoundData,
  SettlementToken,
  SubmissionBatch,
  SubmitterVesting,
} from "@roundfeed/types";
import {
  FundsLedger,
  LedgerError,
  VESTING_PERIOD_SECONDS,
  VestingLedger,
  assertAmount,
  assertRewardRate,
  computeRewardSplit,
} from "@roundfeed/ledger";
import pino from "pino";
import type { Logger } from "pino";
import { normalizeAddress, sameAddress } from "./address.js";
import { SystemClock } from "./clock.js";
import type { EventDraft } from "./event-log.js";
import { InMemoryEventLog } from "./event-log.js";
import { checkQuorum } from "./quorum.js";
import { RoundLedger } from "./round-ledger.js";
import { SerialExecutor } from "./serial.js";
import { buildReportHash, recoverSigner } from "./signature.js";
import type {
  AggregatorConfig,
  AggregatorDeps,
  AggregatorSnapshot,
  FundsView,
  OracleRoundState,
  SubmitResult,
} from "./types.js";
import {
  AggregatorError,
  DEFAULT_REWARD_RATE_X10,
  DEFAULT_VALIDATOR_TIMEOUT_MS,
  MIN_THRESHOLD_PERCENT,
} from "./types.js";
import { runValidation } from "./validator.js";

export class Aggregator {
  readonly address: Address;
  readonly owner: Address;
  readonly description: string;
  readonly minThresholdPercent: number;
  readonly validatorTimeoutMs: number;

  private readonly roster: OracleRoster;
  private readonly token: SettlementToken;
  private readonly clock: Clock;
  private readonly accessController: ReadAccessController | undefined;
  private readonly logger: Logger;
  private readonly eventLog: InMemoryEventLog;
  private readonly executor = new SerialExecutor();
  private readonly pendingValidations = new Set<Promise<unknown>>();

  private validator: DataValidator | undefined;
  private _paymentAmount: bigint;
  private _rewardRateX10: number;
  private rounds: RoundLedger;
  private funds: FundsLedger;
  private vesting: VestingLedger;

  constructor(config: AggregatorConfig, deps: AggregatorDeps) {
    this.address = normalizeAddress(config.address, "address");
    this.owner = normalizeAddress(config.owner, "owner");
    if (config.description.length === 0) {
      throw new AggregatorError("INVALID_CONFIG", "description must not be empty");
    }
    this.description = config.description;

    this._paymentAmount = validPaymentAmount(config.paymentAmount);
    this._rewardRateX10 = validRewardRate(config.rewardRateX10 ?? DEFAULT_REWARD_RATE_X10);

    this.minThresholdPercent = config.minThresholdPercent ?? MIN_THRESHOLD_PERCENT;
    if (!Number.isInteger(this.minThresholdPercent) || this.minThresholdPercent < 1 || this.minThresholdPercent > 100) {
      throw new AggregatorError(
        "INVALID_CONFIG",
        `minThresholdPercent must be an integer in [1, 100], got ${String(this.minThresholdPercent)}`,
      );
    }
    this.validatorTimeoutMs = config.validatorTimeoutMs ?? DEFAULT_VALIDATOR_TIMEOUT_MS;
    if (!Number.isInteger(this.validatorTimeoutMs) || this.validatorTimeoutMs <= 0) {
      throw new AggregatorError(
        "INVALID_CONFIG",
        `validatorTimeoutMs must be a positive integer, got ${String(this.validatorTimeoutMs)}`,
      );
    }
    const vestingPeriod = config.vestingPeriodSeconds ?? VESTING_PERIOD_SECONDS;
    if (!Number.isInteger(vestingPeriod) || vestingPeriod <= 0) {
      throw new AggregatorError(
        "INVALID_CONFIG",
        `vestingPeriodSeconds must be a positive integer, got ${String(vestingPeriod)}`,
      );
    }

    this.roster = deps.roster;
    this.token = deps.token;
    this.clock = deps.clock ?? new SystemClock();
    this.accessController = deps.accessController;
    this.validator = deps.validator;
    this.logger = (deps.logger ?? pino({ level: "silent" })).child({ aggregator: this.address });
    this.eventLog = deps.eventLog ?? new InMemoryEventLog(this.logger);

    this.rounds = new RoundLedger(this.clock.now(), this._paymentAmount);
    this.funds = new FundsLedger();
    this.vesting = new VestingLedger(vestingPeriod);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Submission
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Verify a quorum-signed batch and answer the next round with its median.
   */
  submit(sender: Address, batch: SubmissionBatch): Promise<SubmitResult> {
    return this.executor.run(() => this.processSubmission(sender, batch));
  }

  private async processSubmission(sender: Address, batch: SubmissionBatch): Promise<SubmitResult> {
    const submitter = normalizeAddress(sender, "sender", "MALFORMED_BATCH");
    const now = this.clock.now();
    const log = this.logger.child({ roundId: batch.roundId, submitter });

    checkQuorum(batch, this.roster.oracleCount(), now, this.minThresholdPercent);
    this.rounds.assertNextRound(batch.roundId);

    const hash = buildReportHash({
      roundId: batch.roundId,
      aggregator: this.address,
      prices: batch.prices,
      deadline: batch.deadline,
      description: this.description,
    });
    const recovered = await Promise.all(
      batch.prices.map((_, i) =>
        recoverSigner(hash, { r: batch.r[i] ?? "0x", s: batch.s[i] ?? "0x", v: batch.v[i] ?? 0 }),
      ),
    );

    const signers: Address[] = [];
    for (const [i, signer] of recovered.entries()) {
      if (signer === null) {
        throw new AggregatorError("UNAUTHORIZED_SUBMITTER", `Signature ${String(i)} does not recover a signer`);
      }
      if (!this.roster.isOracleEnabled(signer)) {
        throw new AggregatorError("UNAUTHORIZED_SUBMITTER", `Signer ${signer} is not an enabled oracle`);
      }
      signers.push(signer);
    }

    const duplicates = findDuplicates(signers);
    if (duplicates.length > 0) {
      log.warn({ duplicates }, "batch contains repeated signers");
    }

    const { result, events } = this.commit(() => {
      const drafts: EventDraft[] = [];
      const paymentAmount = this._paymentAmount;

      this.refreshFunds(drafts);
      const fundsBefore = this.funds.available;

      this.rounds.createNewRound(batch.roundId, paymentAmount, now);
      drafts.push({
        type: "round.started",
        payload: { roundId: batch.roundId, startedBy: submitter, startedAt: now },
      });

      for (const signer of signers) {
        this.funds.payOracle(batch.roundId, signer, paymentAmount);
      }
      const split = computeRewardSplit(paymentAmount, signers.length, this._rewardRateX10);
      this.funds.accrueOracleReward(paymentAmount, this._rewardRateX10);
      this.refreshFunds(drafts);
      if (this.funds.available !== fundsBefore) {
        drafts.push({ type: "funds.available-updated", payload: { available: this.funds.available } });
      }

      const round = this.rounds.updateRoundPrice(batch.roundId, batch.prices, now);
      for (const price of batch.prices) {
        drafts.push({ type: "submission.received", payload: { price, roundId: batch.roundId } });
      }
      drafts.push({
        type: "answer.updated",
        payload: { answer: round.answer, roundId: batch.roundId, updatedAt: now },
      });

      this.vesting.append(submitter, split.submitterReward, now);
      if (split.submitterReward > 0n) {
        drafts.push({ type: "rewards.appended", payload: { submitter, amount: split.submitterReward } });
      }

      const submitted: SubmitResult = {
        roundId: batch.roundId,
        answer: round.answer,
        updatedAt: now,
        signers,
        paid: split.totalPaid,
        submitterReward: split.submitterReward,
      };
      return { result: submitted, drafts };
    }, submitter, now);

    log.info(
      {
        answer: result.answer.toString(),
        signers: signers.length,
        paid: result.paid.toString(),
        events: events.length,
      },
      "round answered",
    );

    this.scheduleValidation(batch.roundId, result.answer);
    return result;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Funds
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pull `amount` from `from` into custody. `from` must have approved the
   * aggregator as spender.
   */
  addFunds(from: Address, amount: bigint): Promise<bigint> {
    return this.executor.run(() => {
      assertAmount(amount);
      const funder = normalizeAddress(from, "from");
      const { result } = this.commit(() => {
        const drafts: EventDraft[] = [];
        this.token.transferFrom(this.address, funder, this.address, amount);
        this.refreshFunds(drafts);
        return { result: this.funds.available, drafts };
      }, funder, this.clock.now());
      this.logger.info({ from: funder, amount: amount.toString() }, "funds added");
      return result;
    });
  }

  /**
   * Recompute available funds from the custody balance.
   */
  updateAvailableFunds(): Promise<bigint> {
    return this.executor.run(() => {
      const { result } = this.commit(() => {
        const drafts: EventDraft[] = [];
        this.refreshFunds(drafts);
        return { result: this.funds.available, drafts };
      }, this.address, this.clock.now());
      return result;
    });
  }

  /**
   * Owner only. Send unallocated funds out of custody.
   */
  withdrawFunds(caller: Address, recipient: Address, amount: bigint): Promise<bigint> {
    return this.executor.run(() => {
      this.assertOwner(caller);
      const to = normalizeAddress(recipient, "recipient");
      const { result } = this.commit(() => {
        const drafts: EventDraft[] = [];
        this.refreshFunds(drafts);
        this.funds.assertWithdrawable(amount);
        this.token.transfer(this.address, to, amount);
        this.refreshFunds(drafts);
        return { result: this.funds.available, drafts };
      }, this.owner, this.clock.now());
      this.logger.info({ recipient: to, amount: amount.toString() }, "funds withdrawn");
      return result;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Rewards
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pay out everything vested so far to `submitter`. Anyone may call.
   * Returns the amount paid.
   */
  unlockSubmitterRewards(submitter: Address): Promise<bigint> {
    return this.executor.run(() => {
      const account = normalizeAddress(submitter, "submitter");
      const now = this.clock.now();
      const { result } = this.commit(() => {
        const drafts: EventDraft[] = [];
        const amount = this.vesting.release(account, now);
        if (amount > 0n) {
          this.funds.release(amount);
          this.token.transfer(this.address, account, amount);
          this.refreshFunds(drafts);
          drafts.push({ type: "rewards.unlocked", payload: { submitter: account, amount } });
        }
        return { result: amount, drafts };
      }, account, now);

      if (result > 0n) {
        this.logger.info({ submitter: account, amount: result.toString() }, "rewards unlocked");
      }
      return result;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Owner settings
  // ───────────────────────────────────────────────────────────────────────

  /** Applies to rounds created after the change. */
  updatePaymentAmount(caller: Address, paymentAmount: bigint): void {
    this.assertOwner(caller);
    this._paymentAmount = validPaymentAmount(paymentAmount);
    this.logger.info({ paymentAmount: paymentAmount.toString() }, "payment amount updated");
  }

  setValidator(caller: Address, validator: DataValidator | undefined): void {
    this.assertOwner(caller);
    this.validator = validator;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Round reads
  // ───────────────────────────────────────────────────────────────────────

  latestAnswer(): bigint {
    return this.rounds.latestAnswer();
  }

  latestTimestamp(): number {
    return this.rounds.latestTimestamp();
  }

  latestRound(): number {
    return this.rounds.latestRound();
  }

  latestRoundData(caller: Caller): RoundData {
    this.assertReader(caller);
    return this.rounds.latestRoundData();
  }

  getAnswer(roundId: number): bigint {
    return this.rounds.getAnswer(roundId);
  }

  getTimestamp(roundId: number): number {
    return this.rounds.getTimestamp(roundId);
  }

  getRoundData(caller: Caller, roundId: number): RoundData {
    this.assertReader(caller);
    return this.rounds.getRoundInfo(roundId);
  }

  getRoundInfo(roundId: number): RoundData {
    return this.rounds.getRoundInfo(roundId);
  }

  /** Raw observations behind a round's answer. */
  getSubmissions(roundId: number): readonly bigint[] {
    return this.rounds.get(roundId)?.submissions ?? [];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Other reads
  // ───────────────────────────────────────────────────────────────────────

  get paymentAmount(): bigint {
    return this._paymentAmount;
  }

  get rewardRateX10(): number {
    return this._rewardRateX10;
  }

  get events(): InMemoryEventLog {
    return this.eventLog;
  }

  getAdmin(oracle: Address): Address {
    const status = this.roster.getOracle(oracle);
    if (status === undefined) {
      throw new AggregatorError("ORACLE_NOT_FOUND", `Unknown oracle ${oracle}`);
    }
    return status.admin;
  }

  availableFunds(): bigint {
    return this.funds.available;
  }

  allocatedFunds(): bigint {
    return this.funds.allocated;
  }

  oracleRewardAccumulator(): bigint {
    return this.funds.oracleRewardAccumulator;
  }

  fundsView(): FundsView {
    return {
      available: this.funds.available,
      allocated: this.funds.allocated,
      oracleRewardAccumulator: this.funds.oracleRewardAccumulator,
    };
  }

  /** The stored vesting record, as of its last update. */
  vestingOf(submitter: Address): SubmitterVesting {
    const account = normalizeAddress(submitter, "submitter");
    return { submitter: account, ...this.vesting.get(account) };
  }

  withdrawableRewards(submitter: Address): bigint {
    return this.vesting.withdrawable(normalizeAddress(submitter, "submitter"), this.clock.now());
  }

  /**
   * Reporting state for one oracle. Contracts may not call this.
   */
  oracleRoundState(caller: Caller, oracle: Address): OracleRoundState {
    if (caller.kind !== "account") {
      throw new AggregatorError("UNAUTHORIZED_READER", "oracleRoundState is restricted to accounts");
    }
    const roundId = this.rounds.nextRoundId;
    const status = this.roster.getOracle(oracle);
    const eligibleToSubmit =
      status !== undefined &&
      status.enabled &&
      status.startingRound <= roundId &&
      roundId <= status.endingRound;

    return {
      eligibleToSubmit,
      roundId,
      latestAnswer: this.rounds.latestAnswer(),
      availableFunds: this.funds.available,
      oracleCount: this.roster.oracleCount(),
      paymentAmount: this._paymentAmount,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Resolves once every queued call and every validator check started so
   * far has finished.
   */
  async settleValidations(): Promise<void> {
    await this.executor.idle();
    await Promise.all([...this.pendingValidations]);
  }

  snapshot(): AggregatorSnapshot {
    return {
      version: 1,
      paymentAmount: this._paymentAmount,
      rewardRateX10: this._rewardRateX10,
      rounds: this.rounds.snapshot(),
      funds: this.funds.snapshot(),
      vesting: this.vesting.snapshot(),
    };
  }

  static restore(snapshot: AggregatorSnapshot, config: AggregatorConfig, deps: AggregatorDeps): Aggregator {
    if (snapshot.version !== 1) {
      throw new AggregatorError("INVALID_CONFIG", `Unsupported aggregator snapshot version: ${String(snapshot.version)}`);
    }
    const aggregator = new Aggregator(
      { ...config, paymentAmount: snapshot.paymentAmount, rewardRateX10: snapshot.rewardRateX10 },
      deps,
    );
    aggregator.rounds = RoundLedger.fromSnapshot(snapshot.rounds);
    aggregator.funds = FundsLedger.fromSnapshot(snapshot.funds);
    aggregator.vesting = VestingLedger.fromSnapshot(snapshot.vesting, aggregator.vesting.period);
    return aggregator;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `apply` with every ledger checkpointed. On throw, roll back and
   * rethrow; on success, publish the drafted events.
   */
  private commit<T>(
    apply: () => { result: T; drafts: readonly EventDraft[] },
    actor: Address,
    timestamp: number,
  ): { result: T; events: readonly AggregatorEvent[] } {
    const rounds = this.rounds.checkpoint();
    const funds = this.funds.checkpoint();
    const vesting = this.vesting.checkpoint();

    let outcome: { result: T; drafts: readonly EventDraft[] };
    try {
      outcome = apply();
    } catch (err) {
      this.rounds.rollback(rounds);
      this.funds.rollback(funds);
      this.vesting.rollback(vesting);
      throw err;
    }

    const events = this.eventLog.append(outcome.drafts, actor, timestamp);
    return { result: outcome.result, events };
  }

  private refreshFunds(drafts: EventDraft[]): void {
    const changed = this.funds.refresh(this.token.balanceOf(this.address));
    if (changed) {
      drafts.push({ type: "funds.available-updated", payload: { available: this.funds.available } });
      this.logger.debug({ available: this.funds.available.toString() }, "available funds updated");
    }
  }

  private scheduleValidation(roundId: number, answer: bigint): void {
    const validator = this.validator;
    if (validator === undefined) return;

    const check = runValidation(
      validator,
      {
        previousRoundId: this.rounds.get(roundId - 1)?.answeredInRound ?? 0,
        previousAnswer: this.rounds.getAnswer(roundId - 1),
        roundId,
        answer,
      },
      this.validatorTimeoutMs,
      this.logger,
    ).finally(() => {
      this.pendingValidations.delete(check);
    });
    this.pendingValidations.add(check);
  }

  private assertOwner(caller: Address): void {
    if (!sameAddress(caller, this.owner)) {
      throw new AggregatorError("NOT_OWNER", `${caller} is not the owner`);
    }
  }

  private assertReader(caller: Caller): void {
    if (this.accessController !== undefined && !this.accessController.hasAccess(caller.address)) {
      throw new AggregatorError("UNAUTHORIZED_READER", `${caller.address} may not read round data`);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function validPaymentAmount(amount: bigint): bigint {
  try {
    assertAmount(amount, "paymentAmount");
  } catch (err) {
    throw asConfigError(err);
  }
  return amount;
}

function validRewardRate(rate: number): number {
  try {
    assertRewardRate(rate);
  } catch (err) {
    throw asConfigError(err);
  }
  return rate;
}

function asConfigError(err: unknown): unknown {
  if (err instanceof LedgerError) {
    return new AggregatorError("INVALID_CONFIG", err.message);
  }
  return err;
}

function findDuplicates(addresses: readonly Address[]): Address[] {
  const seen = new Set<Address>();
  const repeated = new Set<Address>();
  for (const address of addresses) {
    if (seen.has(address)) repeated.add(address);
    seen.add(address);
  }
  return [...repeated];
}
