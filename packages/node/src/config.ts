/**
 * @roundfeed/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Address } from "@roundfeed/types";
import { MAX_ROUND_ID } from "@roundfeed/types";
import { normalizeAddress } from "@roundfeed/aggregator";
import type { OracleChange } from "@roundfeed/aggregator";

// =============================================================================
// Schema
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

const AddressVar = z
  .string()
  .regex(ADDRESS_PATTERN, "must be a 0x-prefixed 20-byte address")
  .transform((value) => normalizeAddress(value));

const AmountVar = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer")
  .transform((value) => BigInt(value));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Feed
  AGGREGATOR_ADDRESS: AddressVar,
  OWNER_ADDRESS: AddressVar,
  DESCRIPTION: z.string().min(1),
  PAYMENT_AMOUNT: AmountVar.default("0"),
  REWARD_RATE_X10: z.coerce.number().int().min(0).max(1000).default(50),
  VALIDATOR_TIMEOUT_MS: z.coerce.number().int().min(1).default(1000),
  ORACLES: z.string().default(""),

  // Gated reads
  READ_ACCESS_CHECK: z
    .string()
    .transform((v) => v === "true")
    .default("false"),
  READ_ACCESS_LIST: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export type ApiKeyRole = "owner" | "reporter" | "viewer";
export type ApiKeyKind = "account" | "contract";

export interface ParsedApiKey {
  readonly key: string;
  readonly role: ApiKeyRole;
  readonly address: Address;
  readonly kind: ApiKeyKind;
}

function isRole(value: string): value is ApiKeyRole {
  return value === "owner" || value === "reporter" || value === "viewer";
}

function isKind(value: string): value is ApiKeyKind {
  return value === "account" || value === "contract";
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key:role:address[:kind],..." where kind defaults to account.
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, role, address, kind = "account", ...rest] = entry.trim().split(":");
    if (key === undefined || role === undefined || address === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:address[:kind]`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: owner, reporter, or viewer`,
      );
    }
    if (!ADDRESS_PATTERN.test(address)) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }
    if (!isKind(kind)) {
      throw new Error(`Invalid caller kind "${kind}" in API_KEYS. Must be: account or contract`);
    }

    keys.push({ key, role, address: normalizeAddress(address), kind });
  }

  return keys;
}

// =============================================================================
// Oracle Parsing
// =============================================================================

/**
 * Parse the ORACLES env var into one roster change per entry.
 *
 * Format: "oracle:admin[:startingRound[:endingRound]],..."
 */
export function parseOracles(raw: string): readonly OracleChange[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const [oracle, admin, starting, ending, ...rest] = entry.trim().split(":");
    if (oracle === undefined || admin === undefined || rest.length > 0) {
      throw new Error(
        `Invalid ORACLES entry: "${entry.trim()}". Expected format: oracle:admin[:startingRound[:endingRound]]`,
      );
    }
    if (!ADDRESS_PATTERN.test(oracle) || !ADDRESS_PATTERN.test(admin)) {
      throw new Error(`Invalid address in ORACLES entry "${entry.trim()}"`);
    }
    return {
      add: [{ address: oracle, admin }],
      startingRound: parseRound(starting, 1),
      endingRound: parseRound(ending, MAX_ROUND_ID),
    };
  });
}

function parseRound(value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") {
    return fallback;
  }
  if (!/^\d+$/.test(value) || Number(value) > MAX_ROUND_ID) {
    throw new Error(`Invalid round "${value}" in ORACLES`);
  }
  return Number(value);
}

/**
 * Parse a comma-separated address list.
 */
export function parseAddressList(raw: string): readonly Address[] {
  if (raw.trim() === "") {
    return [];
  }
  return raw.split(",").map((entry) => {
    const address = entry.trim();
    if (!ADDRESS_PATTERN.test(address)) {
      throw new Error(`Invalid address "${address}" in READ_ACCESS_LIST`);
    }
    return normalizeAddress(address);
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
