/**
 * Intent parser client.
 *
 * Free text is never interpreted here. `/process_command` forwards the
 * text to an external parser and hands back the structured intent it
 * returns, once the reply has been validated against the wire schema.
 * Every failure (transport, status, timeout, malformed reply) becomes
 * INTENT_PARSER_UNAVAILABLE.
 */

import { withTimeout } from "@aliaspay/dispatcher";
import { fail, ok, railFailure } from "@aliaspay/types";
import type { Failure, Result } from "@aliaspay/types";
import { WirePaymentIntentSchema } from "../types/dto.js";
import type { WirePaymentIntent } from "../types/dto.js";

export interface ParseCommand {
  readonly text: string;
  readonly userId?: string | undefined;
  readonly timezone: string;
}

export interface IntentParser {
  parse(command: ParseCommand): Promise<Result<WirePaymentIntent>>;
}

export interface HttpIntentParserConfig {
  /** Endpoint accepting `{text, user_id, timezone}` */
  readonly url: string;
  /** Default: 10000 */
  readonly timeoutMs?: number | undefined;
  /** Custom fetch function (for testing) */
  readonly fetchFn?: typeof fetch | undefined;
}

function unavailable(message: string): Failure {
  return railFailure("INTENT_PARSER_UNAVAILABLE", message);
}

export class HttpIntentParser implements IntentParser {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: HttpIntentParserConfig) {
    this.url = config.url;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async parse(command: ParseCommand): Promise<Result<WirePaymentIntent>> {
    let reply: { readonly raw: string; readonly status: number };
    try {
      reply = await withTimeout(
        async (signal) => {
          const response = await this.fetchFn(this.url, {
            method: "POST",
            headers: { "Content-Type": "application/json", "Accept": "application/json" },
            body: JSON.stringify({
              text: command.text,
              user_id: command.userId ?? null,
              timezone: command.timezone,
            }),
            signal,
          });
          return { raw: await response.text(), status: response.status };
        },
        this.timeoutMs,
        "Intent parser",
      );
    } catch (err) {
      return fail(unavailable(err instanceof Error ? err.message : String(err)));
    }

    const { raw, status } = reply;
    if (status < 200 || status >= 300) {
      return fail(unavailable(`Intent parser returned ${status}: ${raw}`));
    }

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      return fail(unavailable("Intent parser returned a non-JSON body"));
    }

    const parsed = WirePaymentIntentSchema.safeParse(body);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first !== undefined && first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
      return fail(unavailable(`Intent parser returned an unexpected intent${where}`));
    }
    return ok(parsed.data);
  }
}

/**
 * Used when no parser is configured.
 */
export class UnconfiguredIntentParser implements IntentParser {
  async parse(): Promise<Result<WirePaymentIntent>> {
    return fail(unavailable("No intent parser is configured"));
  }
}
