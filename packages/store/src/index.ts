/**
 * @aliaspay/store — Versioned key-value persistence.
 *
 * Provides:
 * - KeyValueStore interface with atomic check-and-set commits
 * - InMemoryKeyValueStore for tests and development
 * - JsonlKeyValueStore for durable file-based persistence
 * - KeyedLock for per-key serialization of async work
 *
 * @packageDocumentation
 */

export type {
  VersionedEntry,
  VersionCheck,
  Mutation,
  CommitRequest,
  CommitResult,
  StoreErrorCode,
  KeyValueStore,
} from "./types.js";
export { StoreError } from "./types.js";

export { InMemoryKeyValueStore } from "./in-memory-store.js";
export { JsonlKeyValueStore } from "./jsonl-store.js";
export type { JsonlKeyValueStoreOptions } from "./jsonl-store.js";

export { KeyedLock } from "./keyed-lock.js";
