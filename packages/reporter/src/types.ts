/**
 * @roundfeed/reporter types.
 */

import type { Address, Hex } from "@roundfeed/types";
import type { ReportPayload, SignatureParts } from "@roundfeed/aggregator";

export type { ReportPayload, SignatureParts };

/**
 * One oracle's signature over a report, with the address that made it.
 */
export interface ReportSignature extends SignatureParts {
  readonly signer: Address;
}

export interface SignedReport {
  readonly report: ReportPayload;
  readonly signature: SignatureParts;
}

/** Length of the trailing r ‖ s ‖ v block, in bytes. */
export const SIGNATURE_BYTES = 65;

export type ReportErrorCode = "MALFORMED_REPORT" | "INVALID_KEY" | "EMPTY_BATCH";

export class ReportError extends Error {
  public readonly code: ReportErrorCode;
  constructor(code: ReportErrorCode, message: string) {
    super(message);
    this.name = "ReportError";
    this.code = code;
  }
}

export type PrivateKey = Hex | string;
