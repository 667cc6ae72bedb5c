/**
 * History routes.
 *
 * GET /history/:address?limit=&offset= — Transactions involving an address
 * GET /transaction/:hash               — One transaction by hash
 *
 * `limit` is clamped to 1..HISTORY_MAX_LIMIT and a negative `offset` is
 * read as 0; neither is rejected.
 */

import { Hono } from "hono";
import { unwrap } from "@aliaspay/types";
import type { AppEnv } from "../types/api-contract.js";
import { HistoryQuerySchema, toWireTransaction } from "../types/dto.js";
import type { AliaspayService } from "../services/aliaspay-service.js";

export function createHistoryRoutes(service: AliaspayService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/history/:address", async (c) => {
    const query = HistoryQuerySchema.parse(c.req.query());
    const page = unwrap(await service.history(c.req.param("address"), query.limit, query.offset));

    return c.json({
      address: page.address,
      total_count: page.totalCount,
      count: page.transactions.length,
      limit: page.limit,
      offset: page.offset,
      transactions: page.transactions.map(toWireTransaction),
    });
  });

  routes.get("/transaction/:hash", async (c) => {
    const tx = unwrap(await service.transaction(c.req.param("hash")));
    return c.json(toWireTransaction(tx));
  });

  return routes;
}
