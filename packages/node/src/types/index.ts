/**
 * Type barrel — re-exports all public types from @aliaspay/node.
 */

// DTOs
export {
  WireAmountSchema,
  FrequencySchema,
  WireIntentErrorSchema,
  WirePaymentIntentSchema,
  RegisterAliasSchema,
  SearchAliasQuerySchema,
  ProcessCommandSchema,
  ExecutePaymentSchema,
  PaymentMessageSchema,
  HistoryQuerySchema,
  toPaymentIntent,
  toWireAliasRecord,
  toWireTransaction,
  toWireSubscription,
} from "./dto.js";
export type {
  WirePaymentIntent,
  RegisterAliasDto,
  ProcessCommandDto,
  ExecutePaymentDto,
  PaymentMessageDto,
  WireAliasRecord,
  WirePayee,
  WireTransaction,
  WireSubscription,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, TransportErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
