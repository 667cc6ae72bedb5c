/**
 * Wallet headers.
 *
 * Callers identify themselves with X-Wallet-Address and prove it with an
 * EIP-712 signature in X-Signature. Neither header authenticates on its
 * own; the signature is checked by the component that owns the action.
 */

import type { Context } from "hono";

export const WALLET_ADDRESS_HEADER = "X-Wallet-Address";
export const SIGNATURE_HEADER = "X-Signature";
export const REPLAY_HEADER = "X-Idempotent-Replay";

export interface WalletHeaders {
  /** Empty when the header is absent */
  readonly address: string;
  readonly signature: string;
}

export function walletHeaders(c: Context): WalletHeaders {
  return {
    address: c.req.header(WALLET_ADDRESS_HEADER)?.trim() ?? "",
    signature: c.req.header(SIGNATURE_HEADER)?.trim() ?? "",
  };
}
