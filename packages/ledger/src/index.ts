/**
 * @aliaspay/ledger — Append-only transaction ledger.
 *
 * Design rules:
 * - All types are readonly
 * - No mutation of recorded transactions
 * - A transaction hash is recorded at most once
 */

export { TransactionLedger, DEFAULT_MAX_PAGE_SIZE } from "./ledger.js";
export type { TransactionLedgerOptions, HistoryPage } from "./ledger.js";

export { SubscriptionBook } from "./subscriptions.js";
export type { SubscriptionBookOptions, SubscriptionDraft, CancelOutcome } from "./subscriptions.js";
