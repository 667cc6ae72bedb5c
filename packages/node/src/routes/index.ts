/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAliasRoutes } from "./aliases.js";
export type { AliasRouteDeps } from "./aliases.js";
export { createPaymentRoutes, paymentResponse } from "./payments.js";
export type { PaymentRouteDeps, PaymentSuccessBody, PaymentFailureBody } from "./payments.js";
export { createHistoryRoutes } from "./history.js";
export { createSubscriptionRoutes } from "./subscriptions.js";
