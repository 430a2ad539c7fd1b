/**
 * Reporter — one oracle's signing identity for one aggregator feed.
 */

import type { Address, Hex } from "@roundfeed/types";
import { normalizeAddress } from "@roundfeed/aggregator";
import pino from "pino";
import type { Logger } from "pino";
import type { PrivateKeyAccount } from "viem/accounts";
import { loadAccount, packSignedReport, signWithAccount } from "./report.js";
import type { PrivateKey, ReportPayload, ReportSignature } from "./types.js";

export interface ReporterConfig {
  readonly privateKey: PrivateKey;
  readonly aggregator: string;
  readonly description: string;
  readonly logger?: Logger | undefined;
}

export interface Observation {
  readonly roundId: number;
  readonly prices: readonly bigint[];
  readonly deadline: number;
}

export class Reporter {
  readonly aggregator: Address;
  readonly description: string;
  private readonly account: PrivateKeyAccount;
  private readonly logger: Logger;

  constructor(config: ReporterConfig) {
    this.account = loadAccount(config.privateKey);
    this.aggregator = normalizeAddress(config.aggregator, "aggregator");
    this.description = config.description;
    this.logger = (config.logger ?? pino({ level: "silent" })).child({ reporter: this.account.address });
  }

  get address(): Address {
    return this.account.address;
  }

  report(observation: Observation): ReportPayload {
    return {
      roundId: observation.roundId,
      aggregator: this.aggregator,
      prices: observation.prices,
      deadline: observation.deadline,
      description: this.description,
    };
  }

  async sign(observation: Observation): Promise<ReportSignature> {
    const signature = await signWithAccount(this.account, this.report(observation));
    this.logger.debug(
      { roundId: observation.roundId, prices: observation.prices.length, deadline: observation.deadline },
      "report signed",
    );
    return signature;
  }

  /** Sign and pack for transport to the coordinator. */
  async signPacked(observation: Observation): Promise<Hex> {
    const signature = await this.sign(observation);
    return packSignedReport(this.report(observation), signature);
  }
}
