/**
 * Tests for the intent parser clients.
 */

import { describe, it, expect } from "vitest";
import { HttpIntentParser, UnconfiguredIntentParser } from "../src/services/intent-parser.js";

const PARSER_URL = "http://parser.test/parse";

const PARSED = {
  payment_type: "single",
  intent: { amount: 25, currency: "USDC", recipient: { alias: "@alice" }, memo: null },
  confidence: 0.92,
  requires_confirmation: true,
  confirmation_text: "Send 25 USDC to @alice?",
};

interface RecordedCall {
  readonly url: string;
  readonly method: string | undefined;
  readonly body: unknown;
}

function scriptedFetch(
  status: number,
  body: string,
  calls: RecordedCall[] = [],
): typeof fetch {
  return async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    return new Response(body, { status, headers: { "Content-Type": "application/json" } });
  };
}

describe("HttpIntentParser", () => {
  it("posts the command and returns the validated intent", async () => {
    const calls: RecordedCall[] = [];
    const parser = new HttpIntentParser({
      url: PARSER_URL,
      fetchFn: scriptedFetch(200, JSON.stringify(PARSED), calls),
    });

    const result = await parser.parse({ text: "send 25 to alice", userId: "user-1", timezone: "UTC" });

    expect(result).toEqual({ ok: true, value: PARSED });
    expect(calls).toEqual([
      {
        url: PARSER_URL,
        method: "POST",
        body: { text: "send 25 to alice", user_id: "user-1", timezone: "UTC" },
      },
    ]);
  });

  it("sends a null user_id when none is given", async () => {
    const calls: RecordedCall[] = [];
    const parser = new HttpIntentParser({
      url: PARSER_URL,
      fetchFn: scriptedFetch(200, JSON.stringify(PARSED), calls),
    });

    await parser.parse({ text: "send 25 to alice", timezone: "Europe/Paris" });

    expect(calls[0]?.body).toEqual({ text: "send 25 to alice", user_id: null, timezone: "Europe/Paris" });
  });

  it("fails on a non-2xx status", async () => {
    const parser = new HttpIntentParser({
      url: PARSER_URL,
      fetchFn: scriptedFetch(503, "overloaded"),
    });

    const result = await parser.parse({ text: "pay bob", timezone: "UTC" });

    expect(result).toEqual({
      ok: false,
      error: {
        category: "rail",
        code: "INTENT_PARSER_UNAVAILABLE",
        message: "Intent parser returned 503: overloaded",
        details: undefined,
      },
    });
  });

  it("fails on a body that is not JSON", async () => {
    const parser = new HttpIntentParser({ url: PARSER_URL, fetchFn: scriptedFetch(200, "<html>") });

    const result = await parser.parse({ text: "pay bob", timezone: "UTC" });

    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error.message).toBe("Intent parser returned a non-JSON body");
  });

  it("fails on an intent that does not match the wire schema", async () => {
    const parser = new HttpIntentParser({
      url: PARSER_URL,
      fetchFn: scriptedFetch(200, JSON.stringify({ ...PARSED, confidence: 3 })),
    });

    const result = await parser.parse({ text: "pay bob", timezone: "UTC" });

    expect(result.ok ? undefined : result.error.message).toBe(
      "Intent parser returned an unexpected intent at confidence",
    );
  });

  it("fails when the transport throws", async () => {
    const parser = new HttpIntentParser({
      url: PARSER_URL,
      fetchFn: async () => {
        throw new Error("connect ECONNREFUSED");
      },
    });

    const result = await parser.parse({ text: "pay bob", timezone: "UTC" });

    expect(result.ok ? undefined : result.error).toMatchObject({
      code: "INTENT_PARSER_UNAVAILABLE",
      message: "connect ECONNREFUSED",
    });
  });

  it("fails when the parser does not answer in time", async () => {
    const parser = new HttpIntentParser({
      url: PARSER_URL,
      timeoutMs: 20,
      fetchFn: () => new Promise<Response>(() => undefined),
    });

    const result = await parser.parse({ text: "pay bob", timezone: "UTC" });

    expect(result.ok ? undefined : result.error.message).toBe("Intent parser timed out after 20ms");
  });
});

describe("UnconfiguredIntentParser", () => {
  it("always reports the parser as unavailable", async () => {
    const result = await new UnconfiguredIntentParser().parse();

    expect(result.ok ? undefined : result.error).toMatchObject({
      code: "INTENT_PARSER_UNAVAILABLE",
      message: "No intent parser is configured",
    });
  });
});
