/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, handleNotFound, statusFor } from "./error-handler.js";
export type { ErrorHandlerOptions, ErrorStatus } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
export {
  metricsMiddleware,
  MetricsCollector,
  routeOf,
  PAYMENTS_COUNTER,
  ALIAS_REGISTRATIONS_COUNTER,
} from "./metrics.js";
export {
  walletHeaders,
  WALLET_ADDRESS_HEADER,
  SIGNATURE_HEADER,
  REPLAY_HEADER,
} from "./wallet.js";
export type { WalletHeaders } from "./wallet.js";
