/**
 * @aliaspay/dispatcher — Payment dispatch.
 *
 * Provides:
 * - PaymentDispatcher (validate → resolve → authorize → execute → record)
 * - SettlementRail interface with SimulatedRail and CircleRail
 * - Split validation and allocation
 * - withTimeout for bounded external calls
 *
 * @packageDocumentation
 */

export type {
  DispatchRequest,
  DispatchResult,
  DispatchState,
  DispatchEvent,
  DispatchLogFn,
  ExecutedOutcome,
  IntentRecord,
  ResolvedPayment,
  ResolvedRecipient,
  RailInstruction,
  TransferInstruction,
  SubscriptionInstruction,
  SplitInstruction,
  SplitPayout,
  RailResult,
  SettlementRail,
} from "./types.js";

export {
  PaymentDispatcher,
  DEFAULT_MIN_CONFIDENCE,
  DEFAULT_RAIL_TIMEOUT_MS,
} from "./dispatcher.js";
export type { PaymentDispatcherOptions } from "./dispatcher.js";

export {
  validateSplit,
  allocateSplit,
  toBasisPoints,
  FULL_SHARE_BPS,
  SHARE_TOLERANCE_BPS,
} from "./split.js";
export type { SplitTarget } from "./split.js";

export { withTimeout, TimeoutError } from "./timeout.js";
export { isIntentRecord, isExecutedOutcome } from "./intent-record.js";

export { SimulatedRail } from "./rails/simulated-rail.js";
export { CircleRail, idempotencyKey } from "./rails/circle-rail.js";
export type { CircleRailConfig } from "./rails/circle-rail.js";
