/**
 * @aliaspay/store — File-based JSONL KeyValueStore implementation.
 *
 * Each commit is appended as one JSON line and flushed with fsync before
 * the in-memory state changes. The state is rebuilt by replaying the file
 * on construction.
 *
 * Crash safety:
 * - Partial or unparseable lines (torn writes) are skipped on load
 * - Lines whose values fail the `decode` guard are skipped as a whole
 * - The file is never truncated or rewritten
 *
 * File format:
 * {"version":3,"mutations":[{"kind":"set","key":"alias:bob","value":{...}}]}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import type { Mutation } from "./types.js";
import { StoreError } from "./types.js";
import { InMemoryKeyValueStore } from "./in-memory-store.js";

export interface JsonlKeyValueStoreOptions<V> {
  /** Path to the JSONL file */
  readonly filePath: string;
  /** Guard for values read back from the file */
  readonly decode: (value: unknown) => value is V;
}

export class JsonlKeyValueStore<V> extends InMemoryKeyValueStore<V> {
  private readonly _filePath: string;
  private readonly _decode: (value: unknown) => value is V;

  /**
   * If the file exists, commits are replayed from it. The parent
   * directory is created if it doesn't exist.
   */
  constructor(options: JsonlKeyValueStoreOptions<V>) {
    super();
    this._filePath = options.filePath;
    this._decode = options.decode;

    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  protected override _persist(version: number, mutations: readonly Mutation<V>[]): void {
    const line = JSON.stringify({ version, mutations }) + "\n";
    try {
      const fd = openSync(this._filePath, "a");
      try {
        appendFileSync(fd, line, "utf-8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StoreError("WRITE_FAILED", `Failed to append to ${this._filePath}: ${message}`);
    }
  }

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Corrupt/partial line: skip (crash safety)
        continue;
      }

      const record = this._decodeRecord(parsed);
      if (record !== undefined) {
        this._apply(record.version, record.mutations);
      }
    }
  }

  private _decodeRecord(
    parsed: unknown,
  ): { version: number; mutations: Mutation<V>[] } | undefined {
    if (parsed === null || typeof parsed !== "object" || !("version" in parsed) || !("mutations" in parsed)) {
      return undefined;
    }
    const { version, mutations } = parsed;
    if (typeof version !== "number" || !Array.isArray(mutations)) {
      return undefined;
    }

    const decoded: Mutation<V>[] = [];
    for (const raw of mutations) {
      const mutation = this._decodeMutation(raw);
      if (mutation === undefined) {
        return undefined;
      }
      decoded.push(mutation);
    }
    return { version, mutations: decoded };
  }

  private _decodeMutation(raw: unknown): Mutation<V> | undefined {
    if (raw === null || typeof raw !== "object" || !("kind" in raw) || !("key" in raw)) {
      return undefined;
    }
    const { kind, key } = raw;
    if (typeof key !== "string" || key.length === 0) {
      return undefined;
    }
    if (kind === "delete") {
      return { kind, key };
    }
    if (kind === "set" && "value" in raw && this._decode(raw.value)) {
      return { kind, key, value: raw.value };
    }
    return undefined;
  }
}
