/**
 * Signature verifier.
 *
 * Report hash:
 *   keccak256(encodePacked(uint32 roundId, address aggregator,
 *                          int256[] prices, uint256 deadline, string description))
 *
 * Oracles sign that 32-byte hash as a personal message, so recovery runs
 * over "\x19Ethereum Signed Message:\n32" ‖ hash.
 */

import type { Address, Hex } from "@roundfeed/types";
import { concat, encodePacked, getAddress, keccak256, recoverMessageAddress, toHex } from "viem";

/**
 * The fields every oracle commits to.
 */
export interface ReportPayload {
  readonly roundId: number;
  readonly aggregator: Address;
  readonly prices: readonly bigint[];
  readonly deadline: number;
  readonly description: string;
}

export interface SignatureParts {
  readonly r: Hex;
  readonly s: Hex;
  readonly v: number;
}

export function buildReportHash(report: ReportPayload): Hex {
  return keccak256(
    encodePacked(
      ["uint32", "address", "int256[]", "uint256", "string"],
      [
        report.roundId,
        report.aggregator,
        report.prices,
        BigInt(report.deadline),
        report.description,
      ],
    ),
  );
}

/**
 * Recover the checksummed signer of `hash`, or null when the signature
 * does not recover. Only v = 27 and v = 28 are accepted.
 */
export async function recoverSigner(hash: Hex, signature: SignatureParts): Promise<Address | null> {
  if (signature.v !== 27 && signature.v !== 28) {
    return null;
  }
  try {
    const signer = await recoverMessageAddress({
      message: { raw: hash },
      signature: concat([signature.r, signature.s, toHex(signature.v, { size: 1 })]),
    });
    return getAddress(signer);
  } catch {
    return null;
  }
}
