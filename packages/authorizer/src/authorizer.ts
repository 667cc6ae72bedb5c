/**
 * SignatureAuthorizer
 *
 * Verifies that a wallet signed exactly the message the service is about
 * to act on. Verification fails closed: a malformed signature, an
 * unparsable address or any error thrown during recovery yields `false`.
 *
 * Non-replay is not enforced here; the dispatcher keys it on intentId.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { isHex } from "viem";
import type { TypedDataDomain } from "viem";
import { normalizeAddress, sameAddress } from "@aliaspay/types";
import type { CanonicalAddress, CanonicalAlias } from "@aliaspay/types";
import type {
  AuthorizationBinding,
  AuthorizationDomain,
  StructuredMessage,
} from "./messages.js";
import {
  buildAuthorizationMessage,
  buildCancellationMessage,
  buildDeletionMessage,
  buildRegistrationMessage,
} from "./messages.js";
import { recoverSigner, toTypedDataDomain } from "./typed-data.js";

export class SignatureAuthorizer {
  readonly domain: AuthorizationDomain;
  private readonly _typedDomain: TypedDataDomain;

  constructor(domain: AuthorizationDomain) {
    this.domain = domain;
    this._typedDomain = toTypedDataDomain(domain);
  }

  buildAuthorizationMessage(binding: AuthorizationBinding): StructuredMessage {
    return buildAuthorizationMessage(binding);
  }

  buildRegistrationMessage(alias: CanonicalAlias, address: CanonicalAddress): StructuredMessage {
    return buildRegistrationMessage(alias, address);
  }

  buildDeletionMessage(alias: CanonicalAlias, address: CanonicalAddress): StructuredMessage {
    return buildDeletionMessage(alias, address);
  }

  buildCancellationMessage(id: string, address: CanonicalAddress): StructuredMessage {
    return buildCancellationMessage(id, address);
  }

  /**
   * Check that `signature` over `message` was produced by `claimedAddress`.
   */
  async verify(
    message: StructuredMessage,
    signature: string,
    claimedAddress: string,
  ): Promise<boolean> {
    const claimed = normalizeAddress(claimedAddress);
    const trimmed = signature.trim();
    if (!claimed.ok || !isHex(trimmed, { strict: true })) {
      return false;
    }

    try {
      const recovered = await recoverSigner(this._typedDomain, message, trimmed);
      return sameAddress(recovered, claimed.value);
    } catch {
      // Any recovery failure is a rejection
      return false;
    }
  }

  /**
   * SHA-256 over the canonical JSON of the message (RFC 8785).
   * Equal messages always produce equal digests.
   */
  digest(message: StructuredMessage): string {
    return createHash("sha256").update(canonicalize(message)).digest("hex");
  }
}
