/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Integers that
 * may exceed 2^53 travel as decimal strings and come out as bigint.
 */

import { z } from "zod";
import type { AggregatorEventType, Hex } from "@roundfeed/types";
import { normalizeAddress } from "@roundfeed/aggregator";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "must be a 0x-prefixed 20-byte address")
  .transform((value) => normalizeAddress(value));

/** Any 0x-prefixed hex; sizes are checked by the engine. */
export const HexSchema = z.custom<Hex>(
  (value) => typeof value === "string" && /^0x[0-9a-fA-F]*$/.test(value),
  "must be 0x-prefixed hex",
);

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "must be a non-negative decimal integer string")
  .transform((value) => BigInt(value));

export const PriceSchema = z
  .string()
  .regex(/^-?\d+$/, "must be a decimal integer string")
  .transform((value) => BigInt(value));

export const RoundIdParamSchema = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer")
  .transform((value) => Number(value));

// =============================================================================
// Submission DTOs
// =============================================================================

export const SubmitBatchSchema = z.object({
  roundId: z.number().int().min(0),
  prices: z.array(PriceSchema),
  deadline: z.number().int().min(0),
  r: z.array(HexSchema),
  s: z.array(HexSchema),
  v: z.array(z.number().int()),
});

export type SubmitBatchDto = z.infer<typeof SubmitBatchSchema>;

/** Signed reports as packed by each oracle's reporter. */
export const SubmitPackedSchema = z.object({
  reports: z.array(z.string()).min(1),
});

export type SubmitPackedDto = z.infer<typeof SubmitPackedSchema>;

// =============================================================================
// Funds DTOs
// =============================================================================

export const DepositSchema = z.object({
  amount: AmountSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawalSchema = z.object({
  recipient: AddressSchema,
  amount: AmountSchema,
});

export type WithdrawalDto = z.infer<typeof WithdrawalSchema>;

// =============================================================================
// Event Query
// =============================================================================

const EVENT_TYPES = [
  "round.started",
  "submission.received",
  "answer.updated",
  "funds.available-updated",
  "rewards.appended",
  "rewards.unlocked",
] as const satisfies readonly AggregatorEventType[];

export const ListEventsQuerySchema = z.object({
  fromSequence: z.coerce.number().int().min(1).optional(),
  maxCount: z.coerce.number().int().min(1).max(1000).default(100),
  type: z.enum(EVENT_TYPES).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
