/**
 * AliasRegistry tests.
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import { privateKeyToAccount } from "viem/accounts";
import { InMemoryKeyValueStore } from "@aliaspay/store";
import { SignatureAuthorizer, signStructuredMessage } from "@aliaspay/authorizer";
import type { AuthorizationDomain } from "@aliaspay/authorizer";
import { toCanonicalAddress, toCanonicalAlias } from "@aliaspay/types";
import type { AliasRecord } from "@aliaspay/types";
import { AliasRegistry } from "../src/registry.js";

const DOMAIN: AuthorizationDomain = {
  name: "aliaspay-test",
  version: "1",
  chainId: 31337,
  verifyingContract: "0x0000000000000000000000000000000000000001",
};

const aliceWallet = privateKeyToAccount(`0x${"11".repeat(32)}`);
const bobWallet = privateKeyToAccount(`0x${"22".repeat(32)}`);
const ALICE = toCanonicalAddress(aliceWallet.address);
const BOB = toCanonicalAddress(bobWallet.address);

const authorizer = new SignatureAuthorizer(DOMAIN);
const FIXED = new Date("2026-01-15T10:00:00.000Z");

let store: InMemoryKeyValueStore<AliasRecord>;
let registry: AliasRegistry;

function proveRegistration(wallet: typeof aliceWallet, alias: string): Promise<string> {
  return signStructuredMessage(
    wallet,
    DOMAIN,
    authorizer.buildRegistrationMessage(toCanonicalAlias(alias), toCanonicalAddress(wallet.address)),
  );
}

function proveDeletion(wallet: typeof aliceWallet, alias: string): Promise<string> {
  return signStructuredMessage(
    wallet,
    DOMAIN,
    authorizer.buildDeletionMessage(toCanonicalAlias(alias), toCanonicalAddress(wallet.address)),
  );
}

beforeEach(() => {
  store = new InMemoryKeyValueStore<AliasRecord>();
  registry = new AliasRegistry({ store, authorizer, now: () => FIXED });
});

describe("register", () => {
  it("stores the canonical pair", async () => {
    const result = await registry.register("@Alice", aliceWallet.address, await proveRegistration(aliceWallet, "alice"));
    expect(result).toEqual({
      ok: true,
      value: {
        alias: "alice",
        address: ALICE,
        registeredAt: "2026-01-15T10:00:00.000Z",
        lastUsedAt: "2026-01-15T10:00:00.000Z",
      },
    });
    expect(await registry.count()).toBe(1);
  });

  it("rejects a proof signed by another wallet", async () => {
    const result = await registry.register("@alice", ALICE, await proveRegistration(bobWallet, "alice"));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INVALID_SIGNATURE");
      expect(result.error.message).toBe("Signature invalid or expired");
    }
    expect(store.size).toBe(0);
  });

  it("rejects a taken alias without touching state", async () => {
    await registry.register("@alice", ALICE, await proveRegistration(aliceWallet, "alice"));
    const before = await store.get("alias:alice");

    const result = await registry.register("@ALICE", BOB, await proveRegistration(bobWallet, "alice"));
    expect(result.ok || result.error.code).toBe("ALIAS_TAKEN");
    expect(await store.get("alias:alice")).toEqual(before);
    expect(await store.get(`address:${BOB}`)).toBeUndefined();
  });

  it("rejects a second alias for the same address", async () => {
    await registry.register("@alice", ALICE, await proveRegistration(aliceWallet, "alice"));
    const result = await registry.register("@alice2", ALICE, await proveRegistration(aliceWallet, "alice2"));
    expect(result.ok || result.error.code).toBe("ADDRESS_ALREADY_ALIASED");
    expect(await registry.lookup("alice2")).toBeUndefined();
  });

  it("rejects malformed input before checking the proof", async () => {
    const badAlias = await registry.register("@a!", ALICE, "0x00");
    const badAddress = await registry.register("@alice", "0x123", "0x00");
    expect(badAlias.ok || badAlias.error.code).toBe("INVALID_ALIAS");
    expect(badAddress.ok || badAddress.error.code).toBe("INVALID_FORMAT");
  });

  it("lets one of two concurrent registrations for an alias win", async () => {
    const [a, b] = await Promise.all([
      registry.register("@shared", ALICE, await proveRegistration(aliceWallet, "shared")),
      registry.register("@shared", BOB, await proveRegistration(bobWallet, "shared")),
    ]);
    expect([a.ok, b.ok].filter(Boolean)).toHaveLength(1);
    expect(await registry.count()).toBe(1);
  });
});

describe("resolve / reverseResolve", () => {
  it("round-trips across normalization variants", async () => {
    await registry.register("alice", ALICE, await proveRegistration(aliceWallet, "alice"));

    for (const variant of ["alice", "@alice", "@ALICE", "  Alice "]) {
      expect(await registry.resolve(variant)).toBe(ALICE);
    }
    expect(await registry.reverseResolve(aliceWallet.address.toUpperCase().replace("0X", "0x"))).toBe("alice");
  });

  it("holds the bijection for seeded pairs", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.uniqueArray(fc.stringMatching(/^[a-z][a-z0-9_]{2,10}$/), { minLength: 1, maxLength: 5 }),
        async (aliases) => {
          const local = new AliasRegistry({ store: new InMemoryKeyValueStore<AliasRecord>(), authorizer });
          const pairs = aliases.map((alias, i) => ({
            alias: `@${alias.toUpperCase()}`,
            address: `0x${(i + 1).toString(16).padStart(40, "0")}`,
          }));
          await local.seed(pairs);
          for (const [i, alias] of aliases.entries()) {
            const address = `0x${(i + 1).toString(16).padStart(40, "0")}`;
            expect(await local.resolve(alias)).toBe(address);
            expect(await local.reverseResolve(address)).toBe(alias);
          }
        },
      ),
      { numRuns: 25 },
    );
  });

  it("returns undefined for unknown or malformed input", async () => {
    expect(await registry.resolve("@nobody")).toBeUndefined();
    expect(await registry.resolve("@x")).toBeUndefined();
    expect(await registry.reverseResolve("zzz")).toBeUndefined();
  });

  it("refreshes lastUsedAt on resolve but not on lookup", async () => {
    let clock = new Date("2026-01-15T10:00:00.000Z");
    const local = new AliasRegistry({ store, authorizer, now: () => clock });
    await local.seed([{ alias: "@alice", address: ALICE }]);

    clock = new Date("2026-01-16T10:00:00.000Z");
    await local.lookup("alice");
    expect((await local.lookup("alice"))?.lastUsedAt).toBe("2026-01-15T10:00:00.000Z");

    await local.resolve("alice");
    expect((await local.lookup("alice"))?.lastUsedAt).toBe("2026-01-16T10:00:00.000Z");
    expect((await store.get(`address:${ALICE}`))?.value.lastUsedAt).toBe("2026-01-16T10:00:00.000Z");
  });
});

describe("delete", () => {
  beforeEach(async () => {
    await registry.register("@alice", ALICE, await proveRegistration(aliceWallet, "alice"));
  });

  it("removes both directions for the owner", async () => {
    expect(await registry.delete("@alice", ALICE, await proveDeletion(aliceWallet, "alice"))).toBe("deleted");
    expect(await registry.resolve("alice")).toBeUndefined();
    expect(await registry.reverseResolve(ALICE)).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("refuses a non-owner", async () => {
    expect(await registry.delete("@alice", BOB, await proveDeletion(bobWallet, "alice"))).toBe("not_owner");
    expect(await registry.resolve("alice")).toBe(ALICE);
  });

  it("refuses a registration signature replayed as a deletion proof", async () => {
    const replayed = await proveRegistration(aliceWallet, "alice");
    expect(await registry.delete("@alice", ALICE, replayed)).toBe("invalid_signature");
    expect(await registry.resolve("alice")).toBe(ALICE);
  });

  it("reports an unknown alias", async () => {
    expect(await registry.delete("@ghost", ALICE, "0x00")).toBe("not_found");
  });

  it("frees the address for a new alias", async () => {
    await registry.delete("@alice", ALICE, await proveDeletion(aliceWallet, "alice"));
    const again = await registry.register("@alice_v2", ALICE, await proveRegistration(aliceWallet, "alice_v2"));
    expect(again.ok).toBe(true);
  });
});

describe("search", () => {
  beforeEach(async () => {
    await registry.seed([
      { alias: "@bob", address: BOB },
      { alias: "@alice", address: ALICE },
      { alias: "@alfred", address: "0x3333333333333333333333333333333333333333" },
    ]);
  });

  it("matches by prefix in registration order", async () => {
    expect(await registry.search("@AL", 10)).toEqual([
      { alias: "@alice", address: ALICE },
      { alias: "@alfred", address: "0x3333333333333333333333333333333333333333" },
    ]);
  });

  it("clamps the limit", async () => {
    expect(await registry.search("", 0)).toHaveLength(1);
    expect(await registry.search("", 1000)).toHaveLength(3);
  });
});

describe("seed", () => {
  it("skips pairs already registered as given", async () => {
    await registry.seed([{ alias: "@alice", address: ALICE }]);
    const results = await registry.seed([
      { alias: "@alice", address: ALICE },
      { alias: "@alice", address: BOB },
    ]);
    expect(results.map((r) => r.ok)).toEqual([true, false]);
    expect(await registry.count()).toBe(1);
  });
});
