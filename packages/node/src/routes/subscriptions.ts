/**
 * Subscription routes.
 *
 * GET    /subscriptions/:address — Active subscriptions paid by an address
 * DELETE /subscriptions/:id      — Cancel (X-Wallet-Address must be the payer,
 *                                   X-Signature its cancellation signature)
 */

import { Hono } from "hono";
import { unwrap } from "@aliaspay/types";
import type { AppEnv } from "../types/api-contract.js";
import { toWireSubscription } from "../types/dto.js";
import { walletHeaders } from "../middleware/wallet.js";
import type { AliaspayService } from "../services/aliaspay-service.js";

export function createSubscriptionRoutes(service: AliaspayService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/subscriptions/:address", async (c) => {
    const { address, subscriptions } = unwrap(
      await service.activeSubscriptions(c.req.param("address")),
    );
    return c.json({
      address,
      count: subscriptions.length,
      subscriptions: subscriptions.map(toWireSubscription),
    });
  });

  routes.delete("/subscriptions/:id", async (c) => {
    const subscription = unwrap(
      await service.cancelSubscription(c.req.param("id"), walletHeaders(c)),
    );
    return c.json({ success: true, subscription: toWireSubscription(subscription) });
  });

  return routes;
}
