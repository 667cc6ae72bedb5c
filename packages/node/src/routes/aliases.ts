/**
 * Alias directory routes.
 *
 * POST   /alias/register         — Register an alias (signed by the address)
 * GET    /alias/search           — Prefix search
 * GET    /alias/:alias           — Resolve an alias
 * GET    /address/:address/alias — Reverse lookup
 * DELETE /alias/:alias           — Delete an alias (owner only, signed)
 */

import { Hono } from "hono";
import { displayAlias, unwrap } from "@aliaspay/types";
import type { AppEnv } from "../types/api-contract.js";
import { RegisterAliasSchema, SearchAliasQuerySchema, toWireAliasRecord } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { walletHeaders } from "../middleware/wallet.js";
import { ALIAS_REGISTRATIONS_COUNTER } from "../middleware/metrics.js";
import type { MetricsCollector } from "../middleware/metrics.js";
import type { AliaspayService } from "../services/aliaspay-service.js";

export interface AliasRouteDeps {
  readonly metrics?: MetricsCollector | undefined;
}

export function createAliasRoutes(service: AliaspayService, deps?: AliasRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const metrics = deps?.metrics;

  routes.post("/alias/register", validateBody(RegisterAliasSchema), async (c) => {
    const body = c.get("validatedBody");
    const result = await service.registerAlias(body.alias, body.address, body.signature);

    metrics?.incrementCounter(ALIAS_REGISTRATIONS_COUNTER, {
      outcome: result.ok ? "registered" : result.error.code,
    });

    return c.json(toWireAliasRecord(unwrap(result)), 201);
  });

  // Registered before /alias/:alias so "search" is not taken for an alias
  routes.get("/alias/search", async (c) => {
    const query = SearchAliasQuerySchema.parse(c.req.query());
    const results = await service.searchAliases(query.query, query.limit);
    return c.json({ query: query.query, count: results.length, results });
  });

  routes.get("/alias/:alias", async (c) => {
    const { alias, address } = unwrap(await service.resolveAlias(c.req.param("alias")));
    return c.json({ alias: displayAlias(alias), address });
  });

  routes.get("/address/:address/alias", async (c) => {
    const { address, alias } = unwrap(await service.aliasOf(c.req.param("address")));
    return c.json({ address, alias: alias !== undefined ? displayAlias(alias) : null });
  });

  routes.delete("/alias/:alias", async (c) => {
    const alias = unwrap(await service.deleteAlias(c.req.param("alias"), walletHeaders(c)));
    return c.json({ success: true, message: `Alias ${displayAlias(alias)} deleted` });
  });

  return routes;
}
