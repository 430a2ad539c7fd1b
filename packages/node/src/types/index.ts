/**
 * Type barrel — re-exports all public types from @roundfeed/node.
 */

// DTOs
export {
  AddressSchema,
  HexSchema,
  AmountSchema,
  PriceSchema,
  RoundIdParamSchema,
  SubmitBatchSchema,
  SubmitPackedSchema,
  DepositSchema,
  WithdrawalSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  SubmitBatchDto,
  SubmitPackedDto,
  DepositDto,
  WithdrawalDto,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Wire
export { toWire } from "./wire.js";
export type { JsonValue } from "./wire.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
