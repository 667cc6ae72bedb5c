/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { AliaspayService } from "./services/aliaspay-service.js";
import type { AliaspayServiceConfig, ServiceStores } from "./services/aliaspay-service.js";
import { createErrorHandler, handleNotFound } from "./middleware/error-handler.js";
import type { ErrorHandlerOptions } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { metricsMiddleware, MetricsCollector } from "./middleware/metrics.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAliasRoutes } from "./routes/aliases.js";
import { createPaymentRoutes } from "./routes/payments.js";
import { createHistoryRoutes } from "./routes/history.js";
import { createSubscriptionRoutes } from "./routes/subscriptions.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: AliaspayServiceConfig;
  /** Stores to build the service on; derived from `serviceConfig.dataDir` when absent */
  readonly stores?: ServiceStores | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  readonly onInternalError?: ErrorHandlerOptions["onInternalError"];
  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: AliaspayService;
  readonly metricsCollector: MetricsCollector;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new AliaspayService(options.serviceConfig, options.stores);
  const metricsCollector = new MetricsCollector();
  const enableMetrics = options.enableMetrics !== false;
  const metrics = enableMetrics ? metricsCollector : undefined;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  if (metrics !== undefined) {
    app.use("*", metricsMiddleware(metrics));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler({ onInternalError: options.onInternalError }));
  app.notFound(handleNotFound);

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(service, metrics));
  app.route("/", createAliasRoutes(service, { metrics }));
  app.route("/", createPaymentRoutes(service, { metrics }));
  app.route("/", createHistoryRoutes(service));
  app.route("/", createSubscriptionRoutes(service));

  return { app, service, metricsCollector };
}
