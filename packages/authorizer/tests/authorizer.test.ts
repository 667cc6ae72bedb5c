/**
 * SignatureAuthorizer tests.
 *
 * Signs real EIP-712 messages with local viem accounts and checks that
 * verification binds every field and fails closed.
 */

import { describe, it, expect } from "vitest";
import { privateKeyToAccount } from "viem/accounts";
import { toCanonicalAddress, toCanonicalAlias } from "@aliaspay/types";
import { SignatureAuthorizer } from "../src/authorizer.js";
import type { AuthorizationBinding, AuthorizationDomain } from "../src/messages.js";
import { signStructuredMessage } from "../src/typed-data.js";
import { isStructuredMessage } from "../src/guards.js";

const DOMAIN: AuthorizationDomain = {
  name: "aliaspay-test",
  version: "1",
  chainId: 31337,
  verifyingContract: "0x0000000000000000000000000000000000000001",
};

const caller = privateKeyToAccount(`0x${"11".repeat(32)}`);
const other = privateKeyToAccount(`0x${"22".repeat(32)}`);
const CALLER = toCanonicalAddress(caller.address);
const OTHER = toCanonicalAddress(other.address);
const ALICE = toCanonicalAddress("0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa");

const authorizer = new SignatureAuthorizer(DOMAIN);

function binding(overrides: Partial<AuthorizationBinding> = {}): AuthorizationBinding {
  return {
    intentId: "i1",
    paymentType: "single",
    from: CALLER,
    recipients: [{ address: ALICE, shareBps: 10000 }],
    amount: 50_000_000n,
    currency: "USDC",
    ...overrides,
  };
}

describe("verify", () => {
  it("accepts the signer's own payment authorization", async () => {
    const message = authorizer.buildAuthorizationMessage(binding());
    const signature = await signStructuredMessage(caller, DOMAIN, message);
    expect(await authorizer.verify(message, signature, caller.address)).toBe(true);
  });

  it("compares the claimed address case-insensitively", async () => {
    const message = authorizer.buildAuthorizationMessage(binding());
    const signature = await signStructuredMessage(caller, DOMAIN, message);
    expect(await authorizer.verify(message, signature, CALLER.toUpperCase().replace("0X", "0x"))).toBe(true);
  });

  it("rejects a signature by another wallet", async () => {
    const message = authorizer.buildAuthorizationMessage(binding());
    const signature = await signStructuredMessage(other, DOMAIN, message);
    expect(await authorizer.verify(message, signature, CALLER)).toBe(false);
  });

  it("rejects a signature for a different intent id", async () => {
    const signedA = authorizer.buildAuthorizationMessage(binding({ intentId: "A" }));
    const signature = await signStructuredMessage(caller, DOMAIN, signedA);
    const forB = authorizer.buildAuthorizationMessage(binding({ intentId: "B" }));
    expect(await authorizer.verify(forB, signature, CALLER)).toBe(false);
  });

  it("rejects a changed amount or recipient", async () => {
    const message = authorizer.buildAuthorizationMessage(binding());
    const signature = await signStructuredMessage(caller, DOMAIN, message);

    const richer = authorizer.buildAuthorizationMessage(binding({ amount: 60_000_000n }));
    const redirected = authorizer.buildAuthorizationMessage(
      binding({ recipients: [{ address: OTHER, shareBps: 10000 }] }),
    );
    expect(await authorizer.verify(richer, signature, CALLER)).toBe(false);
    expect(await authorizer.verify(redirected, signature, CALLER)).toBe(false);
  });

  it("rejects a signature from another domain", async () => {
    const message = authorizer.buildAuthorizationMessage(binding());
    const signature = await signStructuredMessage(caller, { ...DOMAIN, chainId: 1 }, message);
    expect(await authorizer.verify(message, signature, CALLER)).toBe(false);
  });

  it("fails closed on malformed input", async () => {
    const message = authorizer.buildAuthorizationMessage(binding());
    expect(await authorizer.verify(message, "not-hex", CALLER)).toBe(false);
    expect(await authorizer.verify(message, "0x1234", CALLER)).toBe(false);
    expect(await authorizer.verify(message, `0x${"00".repeat(65)}`, CALLER)).toBe(false);
    const signature = await signStructuredMessage(caller, DOMAIN, message);
    expect(await authorizer.verify(message, signature, "0xnope")).toBe(false);
  });

  it("does not accept a registration signature as a deletion", async () => {
    const alias = toCanonicalAlias("@alice");
    const registration = authorizer.buildRegistrationMessage(alias, CALLER);
    const signature = await signStructuredMessage(caller, DOMAIN, registration);

    expect(await authorizer.verify(registration, signature, CALLER)).toBe(true);
    expect(
      await authorizer.verify(authorizer.buildDeletionMessage(alias, CALLER), signature, CALLER),
    ).toBe(false);
  });

  it("rejects a payment signature replayed with another memo", async () => {
    const signed = authorizer.buildAuthorizationMessage(binding({ memo: "rent" }));
    const signature = await signStructuredMessage(caller, DOMAIN, signed);

    expect(await authorizer.verify(signed, signature, CALLER)).toBe(true);
    expect(
      await authorizer.verify(
        authorizer.buildAuthorizationMessage(binding({ memo: "groceries" })),
        signature,
        CALLER,
      ),
    ).toBe(false);
  });

  it("binds a cancellation to its subscription id", async () => {
    const message = authorizer.buildCancellationMessage("sub_0123456789abcdef", CALLER);
    const signature = await signStructuredMessage(caller, DOMAIN, message);

    expect(await authorizer.verify(message, signature, CALLER)).toBe(true);
    expect(
      await authorizer.verify(
        authorizer.buildCancellationMessage("sub_fedcba9876543210", CALLER),
        signature,
        CALLER,
      ),
    ).toBe(false);
    expect(await authorizer.verify(message, signature, OTHER)).toBe(false);
  });
});

describe("buildAuthorizationMessage", () => {
  it("binds the schedule of a subscription", () => {
    const message = authorizer.buildAuthorizationMessage(
      binding({ paymentType: "subscription", schedule: "monthly@2026-02-01" }),
    );
    expect(message.primaryType).toBe("PaymentAuthorization");
    if (message.primaryType === "PaymentAuthorization") {
      expect(message.message.schedule).toBe("monthly@2026-02-01");
      expect(message.message.amount).toBe("50000000");
      expect(message.message.recipients).toEqual([{ to: ALICE, shareBps: 10000 }]);
    }
  });

  it("uses an empty schedule otherwise", () => {
    const message = authorizer.buildAuthorizationMessage(binding());
    expect(message.primaryType === "PaymentAuthorization" && message.message.schedule).toBe("");
  });

  it("binds the memo, empty when absent", () => {
    const withMemo = authorizer.buildAuthorizationMessage(binding({ memo: "rent" }));
    const without = authorizer.buildAuthorizationMessage(binding());

    expect(withMemo.primaryType === "PaymentAuthorization" && withMemo.message.memo).toBe("rent");
    expect(without.primaryType === "PaymentAuthorization" && without.message.memo).toBe("");
  });
});

describe("digest", () => {
  it("is deterministic and 64 hex characters", () => {
    const a = authorizer.digest(authorizer.buildAuthorizationMessage(binding()));
    const b = authorizer.digest(authorizer.buildAuthorizationMessage(binding()));
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it("changes with any bound field", () => {
    const base = authorizer.digest(authorizer.buildAuthorizationMessage(binding()));
    expect(authorizer.digest(authorizer.buildAuthorizationMessage(binding({ currency: "EURC" })))).not.toBe(base);
    expect(authorizer.digest(authorizer.buildAuthorizationMessage(binding({ intentId: "i2" })))).not.toBe(base);
  });
});

describe("isStructuredMessage", () => {
  it("accepts every built message after a JSON round trip", () => {
    const messages = [
      authorizer.buildAuthorizationMessage(binding({ memo: "rent" })),
      authorizer.buildRegistrationMessage(toCanonicalAlias("alice"), CALLER),
      authorizer.buildDeletionMessage(toCanonicalAlias("alice"), CALLER),
      authorizer.buildCancellationMessage("sub_0123456789abcdef", CALLER),
    ];

    for (const message of messages) {
      expect(isStructuredMessage(JSON.parse(JSON.stringify(message)))).toBe(true);
    }
  });

  it("rejects unknown types and malformed payment fields", () => {
    const payment = authorizer.buildAuthorizationMessage(binding());

    expect(isStructuredMessage({ primaryType: "Transfer", message: {} })).toBe(false);
    expect(isStructuredMessage({ ...payment, message: { ...payment.message, amount: "1.5" } })).toBe(false);
    expect(isStructuredMessage({ ...payment, message: { ...payment.message, memo: undefined } })).toBe(false);
    expect(isStructuredMessage(null)).toBe(false);
  });
});
