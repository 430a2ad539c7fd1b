import type { Address } from "@roundfeed/types";
import { isAddress } from "@roundfeed/types";
import { getAddress } from "viem";
import type { AggregatorErrorCode } from "./types.js";
import { AggregatorError } from "./types.js";

/**
 * Checksum an address, whatever case it arrived in.
 */
export function normalizeAddress(
  value: string,
  label = "address",
  code: AggregatorErrorCode = "INVALID_CONFIG",
): Address {
  if (!isAddress(value)) {
    throw new AggregatorError(code, `${label} is not a 20-byte hex address: ${value}`);
  }
  return getAddress(value.toLowerCase());
}

export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
