/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect, vi } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";
import {
  authorizationFailure,
  conflictFailure,
  internalFailure,
  notFoundFailure,
  railFailure,
  toError,
  validationFailure,
} from "@aliaspay/types";
import type { Failure } from "@aliaspay/types";
import type { AppEnv } from "../../src/types/api-contract.js";
import { createErrorHandler, handleNotFound, statusFor } from "../../src/middleware/error-handler.js";

function appThrowing(error: unknown, onInternalError?: (err: unknown) => void): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.onError(createErrorHandler({ onInternalError }));
  app.notFound(handleNotFound);
  app.get("/boom", () => {
    throw error;
  });
  return app;
}

function failureApp(failure: Failure): Hono<AppEnv> {
  return appThrowing(toError(failure));
}

describe("statusFor", () => {
  it("maps categories to statuses", () => {
    expect(statusFor("validation", "INVALID_AMOUNT")).toBe(400);
    expect(statusFor("authorization", "INVALID_SIGNATURE")).toBe(403);
    expect(statusFor("authorization", "ADDRESS_MISMATCH")).toBe(401);
    expect(statusFor("not_found", "ALIAS_NOT_FOUND")).toBe(404);
    expect(statusFor("conflict", "ALIAS_TAKEN")).toBe(409);
    expect(statusFor("rail", "RAIL_EXECUTION_FAILED")).toBe(502);
    expect(statusFor("internal", "INTERNAL_ERROR")).toBe(500);
  });
});

describe("error handler", () => {
  it("returns the envelope with details for a domain error", async () => {
    const app = failureApp(
      validationFailure("UNSUPPORTED_CURRENCY", "Currency 'JPY' is not supported", {
        supported: ["USDC"],
      }),
    );

    const res = await app.request("/boom");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "UNSUPPORTED_CURRENCY",
        message: "Currency 'JPY' is not supported",
        details: { supported: ["USDC"] },
      },
    });
  });

  it("omits details when the failure has none", async () => {
    const res = await failureApp(notFoundFailure("ALIAS_NOT_FOUND", "Alias @x not found")).request("/boom");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "ALIAS_NOT_FOUND", message: "Alias @x not found" },
    });
  });

  it("answers 401 for ADDRESS_MISMATCH and 403 for other authorization failures", async () => {
    const mismatch = await failureApp(authorizationFailure("ADDRESS_MISMATCH", "mismatch")).request("/boom");
    const notOwner = await failureApp(authorizationFailure("NOT_OWNER", "not yours")).request("/boom");

    expect(mismatch.status).toBe(401);
    expect(notOwner.status).toBe(403);
  });

  it("answers 409 for conflicts and 502 for rail failures", async () => {
    const conflict = await failureApp(conflictFailure("ALIAS_TAKEN", "taken")).request("/boom");
    const rail = await failureApp(railFailure("RAIL_EXECUTION_FAILED", "down")).request("/boom");

    expect(conflict.status).toBe(409);
    expect(rail.status).toBe(502);
  });

  it("hides internal failures and reports them", async () => {
    const onInternalError = vi.fn();
    const app = appThrowing(toError(internalFailure("ledger store corrupted")), onInternalError);

    const res = await app.request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
    expect(onInternalError).toHaveBeenCalledTimes(1);
  });

  it("hides unexpected errors and reports them", async () => {
    const onInternalError = vi.fn();
    const error = new Error("something broke");
    const app = appThrowing(error, onInternalError);

    const res = await app.request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
    expect(onInternalError).toHaveBeenCalledWith(error, expect.anything());
  });

  it("maps a ZodError to a validation envelope", async () => {
    const parsed = z.object({ limit: z.number() }).safeParse({ limit: "ten" });
    const app = appThrowing(parsed.success ? new Error("unexpected") : parsed.error);

    const res = await app.request("/boom");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request validation failed",
        details: { issues: [{ path: "limit", message: "Expected number, received string" }] },
      },
    });
  });

  it("passes HTTPException responses through", async () => {
    const app = appThrowing(new HTTPException(405, { message: "Use POST" }));

    const res = await app.request("/boom");

    expect(res.status).toBe(405);
    expect(await res.text()).toBe("Use POST");
  });

  it("returns a NOT_FOUND envelope for unknown routes", async () => {
    const res = await appThrowing(new Error("unused")).request("/missing", { method: "POST" });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "NOT_FOUND", message: "No route for POST /missing" },
    });
  });
});
