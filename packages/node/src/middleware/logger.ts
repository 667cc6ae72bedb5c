/**
 * Request logging middleware.
 *
 * Hands one structured entry per request to the supplied sink (pino in
 * the bootstrap). The wallet header is included so that payment traffic
 * can be followed per caller.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { REPLAY_HEADER, WALLET_ADDRESS_HEADER } from "./wallet.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly walletAddress?: string | undefined;
  readonly replayed?: boolean | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      walletAddress: c.req.header(WALLET_ADDRESS_HEADER),
      replayed: c.res.headers.get(REPLAY_HEADER) === "true" ? true : undefined,
    });
  };
}
