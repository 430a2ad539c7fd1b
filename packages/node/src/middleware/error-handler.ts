/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (AggregatorError, LedgerError, ReportError)
 * to appropriate HTTP status codes.
 */

import type { Context } from "hono";
import { AggregatorError } from "@roundfeed/aggregator";
import type { AggregatorErrorCode } from "@roundfeed/aggregator";
import { LedgerError } from "@roundfeed/ledger";
import type { LedgerErrorCode } from "@roundfeed/ledger";
import { ReportError } from "@roundfeed/reporter";
import type { ReportErrorCode } from "@roundfeed/reporter";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

type DomainErrorCode = AggregatorErrorCode | LedgerErrorCode | ReportErrorCode;

export const STATUS_MAP: Record<DomainErrorCode, ErrorStatus> = {
  // Submission
  EXPIRED_BATCH: 422,
  MALFORMED_BATCH: 400,
  QUORUM_NOT_MET: 422,
  NON_SEQUENTIAL_ROUND: 409,
  UNAUTHORIZED_SUBMITTER: 403,

  // Reads
  NO_DATA: 404,
  UNAUTHORIZED_READER: 403,

  // Funds
  INSUFFICIENT_FUNDS: 422,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  INVALID_AMOUNT: 400,
  ARITHMETIC_OVERFLOW: 422,
  ARITHMETIC_UNDERFLOW: 422,

  // Administration
  INVALID_CONFIG: 400,
  INVALID_SNAPSHOT: 400,
  NOT_OWNER: 403,
  NOT_ADMIN: 403,
  ORACLE_EXISTS: 409,
  ORACLE_NOT_FOUND: 404,
  TOO_MANY_ORACLES: 422,

  // Reports
  MALFORMED_REPORT: 400,
  INVALID_KEY: 400,
  EMPTY_BATCH: 400,
};

function domainCode(err: Error): DomainErrorCode | undefined {
  if (err instanceof AggregatorError || err instanceof LedgerError || err instanceof ReportError) {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the onError handler. `onUnexpected` sees every error that is not a
 * known domain error before it is rendered as a 500.
 */
export function createErrorHandler(
  onUnexpected?: (err: Error) => void,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    const code = domainCode(err);
    if (code === undefined) {
      onUnexpected?.(err);
      // Don't leak internal details
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }
    return c.json(createErrorEnvelope(code, err.message), STATUS_MAP[code]);
  };
}
