/**
 * Operational routes.
 *
 * GET /        — Service banner
 * GET /health  — Liveness plus record counts
 * GET /metrics — Prometheus text exposition format
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { MetricsCollector } from "../middleware/metrics.js";
import type { AliaspayService } from "../services/aliaspay-service.js";

export function createHealthRoutes(
  service: AliaspayService,
  collector?: MetricsCollector | undefined,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({
      service: service.authorizer.domain.name,
      version: service.version,
      status: "operational",
      rail: service.rail.name,
      health: "/health",
    });
  });

  routes.get("/health", async (c) => {
    return c.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      version: service.version,
      stats: await service.stats(),
    });
  });

  if (collector !== undefined) {
    routes.get("/metrics", (c) => {
      return c.text(collector.render(), 200, {
        "Content-Type": "text/plain; version=0.0.4; charset=utf-8",
      });
    });
  }

  return routes;
}
