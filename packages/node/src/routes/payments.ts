/**
 * Payment routes.
 *
 * POST /process_command — Free text → structured intent (external parser)
 * POST /payment_message — EIP-712 typed data to sign for an intent
 * POST /execute_payment — Authorize and execute a signed intent
 *
 * `/execute_payment` answers 200 on settlement and 502 when the rail
 * failed; both are recorded outcomes, so a retry of the same signed
 * intent receives the same body again with X-Idempotent-Replay: true.
 * Rejections (validation, resolution, authorization) use the error
 * envelope and are not recorded.
 */

import { Hono } from "hono";
import { unwrap } from "@aliaspay/types";
import type { ExecutedOutcome } from "@aliaspay/dispatcher";
import type { AppEnv } from "../types/api-contract.js";
import {
  ExecutePaymentSchema,
  PaymentMessageSchema,
  ProcessCommandSchema,
  toWireTransaction,
} from "../types/dto.js";
import type { WirePayee } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { REPLAY_HEADER, walletHeaders } from "../middleware/wallet.js";
import { PAYMENTS_COUNTER } from "../middleware/metrics.js";
import type { MetricsCollector } from "../middleware/metrics.js";
import { statusFor } from "../middleware/error-handler.js";
import type { ErrorStatus } from "../middleware/error-handler.js";
import type { AliaspayService } from "../services/aliaspay-service.js";

export interface PaymentRouteDeps {
  readonly metrics?: MetricsCollector | undefined;
}

// =============================================================================
// Response bodies
// =============================================================================

export interface PaymentSuccessBody {
  readonly success: true;
  readonly status: string;
  readonly transaction_hash: string;
  readonly explorer_url: string | null;
  readonly amount: string;
  readonly currency: string;
  readonly payment_type: string;
  readonly from_address: string;
  readonly to_address: string;
  readonly recipients?: readonly WirePayee[];
  readonly subscription_id?: string;
  readonly timestamp: string;
}

export interface PaymentFailureBody {
  readonly success: false;
  readonly status: "failed";
  readonly payment_type: string;
  readonly error: { readonly code: string; readonly message: string };
}

export function paymentResponse(
  outcome: ExecutedOutcome,
):
  | { readonly status: 200; readonly body: PaymentSuccessBody }
  | { readonly status: ErrorStatus; readonly body: PaymentFailureBody } {
  if (outcome.status === "failed") {
    const { failure } = outcome;
    return {
      status: statusFor(failure.category, failure.code),
      body: {
        success: false,
        status: "failed",
        payment_type: outcome.paymentType,
        error: { code: failure.code, message: failure.message },
      },
    };
  }

  const tx = toWireTransaction(outcome.transaction);
  const body: PaymentSuccessBody = {
    success: true,
    status: tx.status,
    transaction_hash: tx.transaction_hash,
    explorer_url: tx.explorer_url,
    amount: tx.amount,
    currency: tx.currency,
    payment_type: tx.payment_type,
    from_address: tx.from_address,
    to_address: tx.to_address,
    timestamp: tx.timestamp,
  };
  return {
    status: 200,
    body: {
      ...body,
      ...(tx.recipients !== undefined ? { recipients: tx.recipients } : {}),
      ...(outcome.subscription !== undefined ? { subscription_id: outcome.subscription.id } : {}),
    },
  };
}

// =============================================================================
// Routes
// =============================================================================

export function createPaymentRoutes(service: AliaspayService, deps?: PaymentRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const metrics = deps?.metrics;

  routes.post("/process_command", validateBody(ProcessCommandSchema), async (c) => {
    const body = c.get("validatedBody");
    const intent = unwrap(
      await service.parseCommand({
        text: body.text,
        userId: body.user_id,
        timezone: body.timezone,
      }),
    );
    return c.json(intent);
  });

  routes.post("/payment_message", validateBody(PaymentMessageSchema), async (c) => {
    const typedData = unwrap(await service.paymentTypedData(c.get("validatedBody")));
    return c.json(typedData);
  });

  routes.post("/execute_payment", validateBody(ExecutePaymentSchema), async (c) => {
    const body = c.get("validatedBody");
    const type = body.payment_intent.payment_type;
    const result = await service.executePayment(body, walletHeaders(c));

    if (!result.ok) {
      metrics?.incrementCounter(PAYMENTS_COUNTER, { type, outcome: "rejected" });
    }
    const { outcome, replayed } = unwrap(result);
    metrics?.incrementCounter(PAYMENTS_COUNTER, {
      type,
      outcome: replayed ? "replayed" : outcome.status,
    });

    if (replayed) {
      c.header(REPLAY_HEADER, "true");
    }
    const response = paymentResponse(outcome);
    return c.json(response.body, response.status);
  });

  return routes;
}
