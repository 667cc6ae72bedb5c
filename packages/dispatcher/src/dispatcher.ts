/**
 * PaymentDispatcher
 *
 * Turns a payment intent plus the caller's signature into exactly one
 * settlement attempt and its ledger record.
 *
 * Pipeline:
 *   1. Validate shape (confidence, currency, amount, split shares)
 *   2. Resolve every recipient alias; any miss rejects the whole intent
 *   3. Authorize (header/body address match, then EIP-712 signature)
 *   4. Claim the intentId and execute on the rail with a bounded timeout
 *   5. Record the transaction (and subscription) on success
 *
 * Idempotency: dispatch for an intentId runs under a per-key lock and a
 * compare-and-swap claim on its IntentRecord. A retry carrying a valid
 * signature over the recorded message gets the recorded outcome back
 * before any other check runs, so later alias or configuration changes
 * never turn a settled payment into a rejection. A different payment
 * under the same intentId is rejected as a replay. Rejections before
 * step 4 leave no record.
 */

import type { AliasRegistry } from "@aliaspay/directory";
import type { AuthorizationBinding, SignatureAuthorizer } from "@aliaspay/authorizer";
import type { SubscriptionBook, TransactionLedger } from "@aliaspay/ledger";
import { KeyedLock } from "@aliaspay/store";
import type { KeyValueStore } from "@aliaspay/store";
import {
  MULTIPLE_RECIPIENTS,
  authorizationFailure,
  displayAlias,
  fail,
  formatBaseUnits,
  normalizeAddress,
  normalizeAlias,
  notFoundFailure,
  ok,
  parsePositiveAmount,
  railFailure,
  validationFailure,
} from "@aliaspay/types";
import type {
  CanonicalAddress,
  CurrencySpec,
  Fail,
  Failure,
  Frequency,
  ParsedAmount,
  PaymentIntent,
  PaymentType,
  Result,
  Subscription,
  TransactionDraft,
} from "@aliaspay/types";
import { allocateSplit, FULL_SHARE_BPS, validateSplit } from "./split.js";
import type { SplitTarget } from "./split.js";
import { withTimeout } from "./timeout.js";
import type {
  DispatchEvent,
  DispatchLogFn,
  DispatchRequest,
  DispatchResult,
  ExecutedOutcome,
  IntentRecord,
  RailInstruction,
  RailResult,
  ResolvedPayment,
  ResolvedRecipient,
  SettlementRail,
} from "./types.js";

export const DEFAULT_MIN_CONFIDENCE = 0.5;
export const DEFAULT_RAIL_TIMEOUT_MS = 30_000;

export interface PaymentDispatcherOptions {
  readonly registry: AliasRegistry;
  readonly authorizer: SignatureAuthorizer;
  readonly ledger: TransactionLedger;
  readonly subscriptions: SubscriptionBook;
  readonly rail: SettlementRail;
  readonly intents: KeyValueStore<IntentRecord>;
  readonly currencies: readonly CurrencySpec[];
  /** Intents below this parser confidence are rejected. Default: 0.5 */
  readonly minConfidence?: number | undefined;
  /** Default: 30000 */
  readonly railTimeoutMs?: number | undefined;
  /** Base URL of a block explorer; `/tx/<hash>` is appended */
  readonly explorerUrl?: string | undefined;
  readonly log?: DispatchLogFn | undefined;
  readonly now?: (() => Date) | undefined;
}

/**
 * An intent that passed shape validation.
 */
interface ValidatedIntent {
  readonly paymentType: PaymentType;
  readonly amount: ParsedAmount;
  readonly currency: string;
  readonly targets: readonly SplitTarget[];
  readonly memo?: string | undefined;
  readonly frequency?: Frequency | undefined;
  readonly startDate?: string | undefined;
}

const INTENT_PREFIX = "intent:";

type SettledRailResult = Extract<RailResult, { ok: true }>;

export class PaymentDispatcher {
  private readonly _registry: AliasRegistry;
  private readonly _authorizer: SignatureAuthorizer;
  private readonly _ledger: TransactionLedger;
  private readonly _subscriptions: SubscriptionBook;
  private readonly _rail: SettlementRail;
  private readonly _intents: KeyValueStore<IntentRecord>;
  private readonly _currencies: ReadonlyMap<string, CurrencySpec>;
  private readonly _minConfidence: number;
  private readonly _railTimeoutMs: number;
  private readonly _explorerUrl: string | undefined;
  private readonly _log: DispatchLogFn;
  private readonly _now: () => Date;
  private readonly _lock = new KeyedLock();

  constructor(options: PaymentDispatcherOptions) {
    this._registry = options.registry;
    this._authorizer = options.authorizer;
    this._ledger = options.ledger;
    this._subscriptions = options.subscriptions;
    this._rail = options.rail;
    this._intents = options.intents;
    this._currencies = new Map(options.currencies.map((c) => [c.symbol.toUpperCase(), c]));
    this._minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
    this._railTimeoutMs = options.railTimeoutMs ?? DEFAULT_RAIL_TIMEOUT_MS;
    this._explorerUrl = options.explorerUrl?.replace(/\/+$/, "");
    this._log = options.log ?? (() => undefined);
    this._now = options.now ?? (() => new Date());
  }

  /**
   * Run one intent through the pipeline.
   *
   * A failed result is a rejection: nothing was executed or recorded.
   * A successful result carries the terminal outcome, which may itself
   * be a rail failure.
   */
  dispatch(request: DispatchRequest): Promise<Result<DispatchResult>> {
    return this._lock.run(request.intentId, () => this._dispatch(request));
  }

  /**
   * Shape validation and recipient resolution only. Used to build the
   * message a wallet must sign before calling `dispatch`. Does not count
   * as a use of the recipients' aliases.
   */
  async prepare(intent: PaymentIntent): Promise<Result<ResolvedPayment>> {
    const validated = this.validate(intent);
    if (!validated.ok) return validated;
    return this._resolve(validated.value, false);
  }

  /**
   * The authorization binding for an intent resolved by `prepare`.
   */
  binding(intentId: string, from: CanonicalAddress, payment: ResolvedPayment): AuthorizationBinding {
    return {
      intentId,
      paymentType: payment.paymentType,
      from,
      recipients: payment.recipients.map((r) => ({ address: r.address, shareBps: r.shareBps })),
      amount: payment.units,
      currency: payment.currency,
      schedule:
        payment.frequency !== undefined && payment.startDate !== undefined
          ? `${payment.frequency}@${payment.startDate}`
          : undefined,
      memo: payment.memo,
    };
  }

  /**
   * Step 1. Never touches the registry. A subscription without a start
   * date starts today (UTC, from the dispatcher's clock).
   */
  validate(intent: PaymentIntent): Result<ValidatedIntent> {
    if (intent.error !== undefined) {
      return fail(
        validationFailure("INVALID_INTENT", `Intent could not be parsed: ${intent.error.message}`, {
          parserCode: intent.error.code,
        }),
      );
    }
    if (!(intent.confidence >= this._minConfidence)) {
      return fail(
        validationFailure(
          "LOW_CONFIDENCE",
          `Intent confidence ${intent.confidence} is below ${this._minConfidence}`,
        ),
      );
    }

    const currency = intent.currency.trim().toUpperCase();
    const spec = this._currencies.get(currency);
    if (spec === undefined) {
      return fail(
        validationFailure("UNSUPPORTED_CURRENCY", `Currency '${intent.currency}' is not supported`, {
          supported: [...this._currencies.keys()],
        }),
      );
    }

    const amount = parsePositiveAmount(intent.amount, spec.decimals);
    if (!amount.ok) return amount;

    const base = { amount: amount.value, currency, memo: intent.memo };

    switch (intent.type) {
      case "single": {
        const alias = normalizeAlias(intent.recipientAlias);
        if (!alias.ok) return alias;
        return ok({
          ...base,
          paymentType: "single",
          targets: [{ alias: alias.value, shareBps: FULL_SHARE_BPS }],
        });
      }
      case "subscription": {
        const alias = normalizeAlias(intent.recipientAlias);
        if (!alias.ok) return alias;
        const startDate = intent.startDate ?? this._now().toISOString().slice(0, 10);
        if (Number.isNaN(Date.parse(startDate))) {
          return fail(validationFailure("INVALID_INTENT", `Start date '${startDate}' is not a date`));
        }
        return ok({
          ...base,
          paymentType: "subscription",
          targets: [{ alias: alias.value, shareBps: FULL_SHARE_BPS }],
          frequency: intent.frequency,
          startDate,
        });
      }
      case "split": {
        const targets = validateSplit(intent.recipients);
        if (!targets.ok) return targets;
        return ok({ ...base, paymentType: "split", targets: targets.value });
      }
    }
  }

  // ─── Pipeline ───────────────────────────────────────────────────────

  private async _dispatch(request: DispatchRequest): Promise<Result<DispatchResult>> {
    const { intentId, intent } = request;
    this._emit({ intentId, state: "received", paymentType: intent.type });

    if (intentId.trim().length === 0) {
      return this._reject(intentId, intent.type, validationFailure("INVALID_INTENT", "Intent id is empty"));
    }

    const key = `${INTENT_PREFIX}${intentId}`;
    const recorded = await this._replayRecorded(key, request);
    if (recorded !== undefined) return recorded;

    // 1–2. Validate and resolve
    const validated = this.validate(intent);
    if (!validated.ok) return this._reject(intentId, intent.type, validated.error);
    const resolved = await this._resolve(validated.value, true);
    if (!resolved.ok) return this._reject(intentId, intent.type, resolved.error);
    const payment = resolved.value;
    this._emit({ intentId, state: "recipients_resolved", paymentType: payment.paymentType });

    // 3. Authorize
    const from = this._authenticatedClaim(request);
    if (from === undefined) {
      return this._reject(
        intentId,
        payment.paymentType,
        authorizationFailure("ADDRESS_MISMATCH", "Wallet address does not match the request"),
      );
    }

    const message = this._authorizer.buildAuthorizationMessage(this.binding(intentId, from, payment));
    if (!(await this._authorizer.verify(message, request.signature, from))) {
      return this._reject(intentId, payment.paymentType, authorizationFailure("INVALID_SIGNATURE"));
    }
    const digest = this._authorizer.digest(message);

    // 4. Claim
    const claim = await this._intents.commit({
      checks: [{ key, version: null }],
      mutations: [
        {
          kind: "set",
          key,
          value: { intentId, digest, message, state: "executing", updatedAt: this._now().toISOString() },
        },
      ],
    });
    if (!claim.committed) {
      const existing = await this._intents.get(key);
      return this._fromRecord(intentId, payment.paymentType, digest, existing?.value);
    }
    this._emit({ intentId, state: "authorized", paymentType: payment.paymentType });

    // 4–5. Execute and record
    const outcome = await this._execute(intentId, from, payment);
    await this._intents.put(key, {
      intentId,
      digest,
      message,
      state: "executed",
      outcome,
      updatedAt: this._now().toISOString(),
    });

    this._emit({
      intentId,
      state: "executed",
      paymentType: payment.paymentType,
      code: outcome.status === "failed" ? outcome.failure.code : undefined,
      message: outcome.status === "failed" ? outcome.failure.message : undefined,
    });
    return ok({ outcome, replayed: false });
  }

  /**
   * The header address, when it matches the address claimed in the body.
   */
  private _authenticatedClaim(request: DispatchRequest): CanonicalAddress | undefined {
    const authenticated = normalizeAddress(request.authenticatedAddress);
    const claimed = normalizeAddress(request.claimedAddress);
    if (!authenticated.ok || !claimed.ok || authenticated.value !== claimed.value) {
      return undefined;
    }
    return claimed.value;
  }

  /**
   * Recorded outcome for a retry signed over the recorded message.
   * Anything else goes through the full pipeline.
   */
  private async _replayRecorded(
    key: string,
    request: DispatchRequest,
  ): Promise<Result<DispatchResult> | undefined> {
    const record = (await this._intents.get(key))?.value;
    if (record === undefined || record.state !== "executed" || record.outcome === undefined) {
      return undefined;
    }
    const { outcome } = record;

    const from = this._authenticatedClaim(request);
    if (from === undefined || !(await this._authorizer.verify(record.message, request.signature, from))) {
      return undefined;
    }

    this._emit({ intentId: record.intentId, state: "replayed", paymentType: outcome.paymentType });
    return ok({ outcome, replayed: true });
  }

  /**
   * `touch` refreshes each alias's `lastUsedAt`; only dispatch does.
   */
  private async _resolve(validated: ValidatedIntent, touch: boolean): Promise<Result<ResolvedPayment>> {
    const { units, decimals } = validated.amount;
    const payouts = allocateSplit(
      units,
      validated.targets.map((t) => t.shareBps),
    );

    const recipients: ResolvedRecipient[] = [];
    for (const [i, target] of validated.targets.entries()) {
      const address = touch
        ? await this._registry.resolve(target.alias)
        : (await this._registry.lookup(target.alias))?.address;
      if (address === undefined) {
        const alias = displayAlias(target.alias);
        return fail(notFoundFailure("RECIPIENT_NOT_FOUND", `Recipient ${alias} not found`, { alias }));
      }
      recipients.push({
        alias: target.alias,
        address,
        shareBps: target.shareBps,
        amount: formatBaseUnits(payouts[i] ?? 0n, decimals),
      });
    }

    return ok({
      paymentType: validated.paymentType,
      amount: validated.amount.amount,
      units,
      currency: validated.currency,
      memo: validated.memo,
      frequency: validated.frequency,
      startDate: validated.startDate,
      recipients,
    });
  }

  private _fromRecord(
    intentId: string,
    paymentType: PaymentType,
    digest: string,
    record: IntentRecord | undefined,
  ): Result<DispatchResult> {
    if (record !== undefined && record.digest !== digest) {
      return this._reject(
        intentId,
        paymentType,
        authorizationFailure("INTENT_REPLAYED", `Intent ${intentId} was already used for a different payment`),
      );
    }
    if (record?.state === "executed" && record.outcome !== undefined) {
      this._emit({ intentId, state: "replayed", paymentType });
      return ok({ outcome: record.outcome, replayed: true });
    }
    return this._reject(
      intentId,
      paymentType,
      railFailure("RAIL_EXECUTION_FAILED", `Intent ${intentId} has an execution in progress`),
    );
  }

  private async _execute(
    intentId: string,
    from: CanonicalAddress,
    payment: ResolvedPayment,
  ): Promise<ExecutedOutcome> {
    const { paymentType } = payment;
    const instruction = this._instruction(intentId, from, payment);

    let result: RailResult;
    try {
      result = await withTimeout(
        (signal) => this._rail.initiateTransfer(instruction, { signal }),
        this._railTimeoutMs,
        `${this._rail.name} transfer`,
      );
    } catch (err) {
      result = { ok: false, error: err instanceof Error ? err.message : String(err) };
    }

    if (!result.ok) {
      return { status: "failed", paymentType, failure: railFailure("RAIL_EXECUTION_FAILED", result.error) };
    }

    // Funds have moved; a storage error here must still end in a recorded outcome
    try {
      return await this._record(intentId, from, payment, result);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return {
        status: "failed",
        paymentType,
        failure: railFailure(
          "SETTLEMENT_NOT_RECORDED",
          `Transfer ${result.transactionHash} settled but could not be recorded: ${reason}`,
          { transactionHash: result.transactionHash },
        ),
      };
    }
  }

  private async _record(
    intentId: string,
    from: CanonicalAddress,
    payment: ResolvedPayment,
    result: SettledRailResult,
  ): Promise<ExecutedOutcome> {
    const { paymentType } = payment;
    const first = payment.recipients[0];
    const draft: TransactionDraft = {
      transactionHash: result.transactionHash,
      intentId,
      fromAddress: from,
      toAddress: paymentType === "split" || first === undefined ? MULTIPLE_RECIPIENTS : first.address,
      recipients:
        paymentType === "split"
          ? payment.recipients.map((r) => ({
              address: r.address,
              alias: r.alias,
              shareBps: r.shareBps,
              amount: r.amount,
            }))
          : undefined,
      amount: payment.amount,
      currency: payment.currency,
      paymentType,
      status: result.status,
      memo: payment.memo,
      explorerUrl:
        this._explorerUrl !== undefined ? `${this._explorerUrl}/tx/${result.transactionHash}` : undefined,
      timestamp: this._now().toISOString(),
    };

    const appended = await this._ledger.append(draft);
    if (!appended.ok) {
      return { status: "failed", paymentType, failure: appended.error };
    }

    let subscription: Subscription | undefined;
    if (
      paymentType === "subscription" &&
      first !== undefined &&
      payment.frequency !== undefined &&
      payment.startDate !== undefined
    ) {
      subscription = await this._subscriptions.create({
        intentId,
        fromAddress: from,
        toAddress: first.address,
        amount: payment.amount,
        currency: payment.currency,
        frequency: payment.frequency,
        startDate: payment.startDate,
        railSubscriptionId: result.subscriptionId,
      });
    }

    return { status: "success", paymentType, transaction: appended.value, subscription };
  }

  private _instruction(
    intentId: string,
    from: CanonicalAddress,
    payment: ResolvedPayment,
  ): RailInstruction {
    const first = payment.recipients[0];
    if (payment.paymentType === "split" || first === undefined) {
      return {
        kind: "split",
        intentId,
        from,
        total: payment.amount,
        currency: payment.currency,
        payouts: payment.recipients.map((r) => ({ to: r.address, amount: r.amount })),
        memo: payment.memo,
      };
    }
    if (
      payment.paymentType === "subscription" &&
      payment.frequency !== undefined &&
      payment.startDate !== undefined
    ) {
      return {
        kind: "subscription",
        intentId,
        from,
        to: first.address,
        amount: payment.amount,
        currency: payment.currency,
        frequency: payment.frequency,
        startDate: payment.startDate,
        memo: payment.memo,
      };
    }
    return {
      kind: "transfer",
      intentId,
      from,
      to: first.address,
      amount: payment.amount,
      currency: payment.currency,
      memo: payment.memo,
    };
  }

  private _reject(intentId: string, paymentType: PaymentType, failure: Failure): Fail<Failure> {
    this._emit({ intentId, state: "rejected", paymentType, code: failure.code, message: failure.message });
    return fail(failure);
  }

  private _emit(event: DispatchEvent): void {
    this._log(event);
  }
}
