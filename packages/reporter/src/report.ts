/**
 * Report signing and transport encoding.
 *
 * Oracles sign the aggregator's report hash as a personal message.
 * For transport between an oracle and the coordinator, a signed report
 * is packed into one hex blob:
 *
 *   abi.encode(uint32 roundId, address aggregator, int256[] prices,
 *              uint256 deadline, string description) ‖ r ‖ s ‖ v
 *
 * The last 65 bytes are always the signature.
 */

import type { Address, Hex, SubmissionBatch } from "@roundfeed/types";
import { buildReportHash, recoverSigner } from "@roundfeed/aggregator";
import type { PrivateKeyAccount } from "viem/accounts";
import { privateKeyToAccount } from "viem/accounts";
import {
  concat,
  decodeAbiParameters,
  encodeAbiParameters,
  hexToNumber,
  isHex,
  parseAbiParameters,
  size,
  slice,
  toHex,
} from "viem";
import type {
  PrivateKey,
  ReportPayload,
  ReportSignature,
  SignatureParts,
  SignedReport,
} from "./types.js";
import { ReportError, SIGNATURE_BYTES } from "./types.js";

const REPORT_ABI = parseAbiParameters(
  "uint32 roundId, address aggregator, int256[] prices, uint256 deadline, string description",
);

// =============================================================================
// Keys
// =============================================================================

/**
 * Load a signing account. Keys are accepted with or without the 0x prefix.
 */
export function loadAccount(privateKey: PrivateKey): PrivateKeyAccount {
  const key = privateKey.startsWith("0x") ? privateKey : `0x${privateKey}`;
  if (!isHex(key) || size(key) !== 32) {
    throw new ReportError("INVALID_KEY", "Private key must be 32 bytes of hex");
  }
  try {
    return privateKeyToAccount(key);
  } catch (err) {
    throw new ReportError("INVALID_KEY", `Private key is not a valid secp256k1 scalar: ${String(err)}`);
  }
}

export function reporterAddress(privateKey: PrivateKey): Address {
  return loadAccount(privateKey).address;
}

// =============================================================================
// Signing
// =============================================================================

export async function signWithAccount(
  account: PrivateKeyAccount,
  report: ReportPayload,
): Promise<ReportSignature> {
  const signature = await account.signMessage({ message: { raw: buildReportHash(report) } });
  return {
    signer: account.address,
    r: slice(signature, 0, 32),
    s: slice(signature, 32, 64),
    v: hexToNumber(slice(signature, 64, 65)),
  };
}

export function signReport(privateKey: PrivateKey, report: ReportPayload): Promise<ReportSignature> {
  return signWithAccount(loadAccount(privateKey), report);
}

/**
 * The address that produced `signature` over `report`, or null.
 */
export function recoverReportSigner(report: ReportPayload, signature: SignatureParts): Promise<Address | null> {
  return recoverSigner(buildReportHash(report), signature);
}

// =============================================================================
// Packing
// =============================================================================

export function packSignedReport(report: ReportPayload, signature: SignatureParts): Hex {
  const encoded = encodeAbiParameters(REPORT_ABI, [
    report.roundId,
    report.aggregator,
    report.prices,
    BigInt(report.deadline),
    report.description,
  ]);
  return concat([encoded, signature.r, signature.s, toHex(signature.v, { size: 1 })]);
}

export function unpackSignedReport(data: string): SignedReport {
  if (!data.startsWith("0x")) {
    throw new ReportError("MALFORMED_REPORT", "Signed report must be 0x-prefixed hex");
  }
  if (!isHex(data, { strict: true }) || data.length % 2 !== 0) {
    throw new ReportError("MALFORMED_REPORT", "Signed report is not valid hex");
  }
  const total = size(data);
  if (total < SIGNATURE_BYTES) {
    throw new ReportError(
      "MALFORMED_REPORT",
      `Signed report is ${String(total)} bytes, shorter than a ${String(SIGNATURE_BYTES)}-byte signature`,
    );
  }

  const body = total === SIGNATURE_BYTES ? "0x" : slice(data, 0, total - SIGNATURE_BYTES);
  const signature: SignatureParts = {
    r: slice(data, total - SIGNATURE_BYTES, total - 33),
    s: slice(data, total - 33, total - 1),
    v: hexToNumber(slice(data, total - 1, total)),
  };

  try {
    return { report: decodeReport(body), signature };
  } catch (err) {
    if (err instanceof ReportError) throw err;
    throw new ReportError("MALFORMED_REPORT", `Report body does not decode: ${String(err)}`);
  }
}

function decodeReport(body: Hex): ReportPayload {
  const [roundId, aggregator, prices, deadline, description] = decodeAbiParameters(REPORT_ABI, body);
  if (deadline > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new ReportError("MALFORMED_REPORT", `Deadline ${deadline.toString()} is out of range`);
  }
  return { roundId, aggregator, prices: [...prices], deadline: Number(deadline), description };
}

// =============================================================================
// Batch assembly
// =============================================================================

/**
 * Turn collected signatures into a submission. Signatures keep their
 * collection order and are not de-duplicated.
 */
export function assembleBatch(report: ReportPayload, signatures: readonly SignatureParts[]): SubmissionBatch {
  if (signatures.length !== report.prices.length) {
    throw new ReportError(
      "MALFORMED_REPORT",
      `${String(signatures.length)} signatures for ${String(report.prices.length)} prices`,
    );
  }
  if (signatures.length === 0) {
    throw new ReportError("EMPTY_BATCH", "A batch needs at least one signature");
  }
  return {
    roundId: report.roundId,
    prices: report.prices,
    deadline: report.deadline,
    r: signatures.map((sig) => sig.r),
    s: signatures.map((sig) => sig.s),
    v: signatures.map((sig) => sig.v),
  };
}
