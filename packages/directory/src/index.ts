/**
 * @aliaspay/directory — Alias registry.
 *
 * @packageDocumentation
 */

export { AliasRegistry, SEARCH_MAX_LIMIT } from "./registry.js";
export type { AliasRegistryOptions, DeleteOutcome, SeedEntry } from "./registry.js";
