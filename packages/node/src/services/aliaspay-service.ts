/**
 * AliaspayService — Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. Methods return `Result` values that the routes
 * unwrap into HTTP errors.
 */

import { join } from "node:path";
import { SignatureAuthorizer, PAYMENT_AUTHORIZATION_TYPES } from "@aliaspay/authorizer";
import type { AuthorizationDomain, PaymentAuthorizationMessage } from "@aliaspay/authorizer";
import { AliasRegistry } from "@aliaspay/directory";
import type { SeedEntry } from "@aliaspay/directory";
import { isIntentRecord, PaymentDispatcher } from "@aliaspay/dispatcher";
import type {
  DispatchLogFn,
  DispatchResult,
  IntentRecord,
  SettlementRail,
} from "@aliaspay/dispatcher";
import { SubscriptionBook, TransactionLedger } from "@aliaspay/ledger";
import type { HistoryPage } from "@aliaspay/ledger";
import { InMemoryKeyValueStore, JsonlKeyValueStore } from "@aliaspay/store";
import type { KeyValueStore } from "@aliaspay/store";
import {
  authorizationFailure,
  fail,
  isAliasRecord,
  isSubscription,
  isTransaction,
  normalizeAddress,
  normalizeAlias,
  notFoundFailure,
  ok,
} from "@aliaspay/types";
import type {
  AliasMatch,
  AliasRecord,
  CanonicalAddress,
  CanonicalAlias,
  CurrencySpec,
  Result,
  Subscription,
  Transaction,
} from "@aliaspay/types";
import { toPaymentIntent } from "../types/dto.js";
import type { ExecutePaymentDto, PaymentMessageDto, WirePaymentIntent } from "../types/dto.js";
import { UnconfiguredIntentParser } from "./intent-parser.js";
import type { IntentParser, ParseCommand } from "./intent-parser.js";

// =============================================================================
// Configuration
// =============================================================================

export interface AliaspayServiceConfig {
  readonly version: string;
  readonly domain: AuthorizationDomain;
  readonly currencies: readonly CurrencySpec[];
  readonly defaultCurrency: string;
  readonly rail: SettlementRail;
  readonly minConfidence?: number | undefined;
  readonly railTimeoutMs?: number | undefined;
  readonly explorerUrl?: string | undefined;
  readonly historyMaxLimit?: number | undefined;
  readonly intentParser?: IntentParser | undefined;
  /** JSONL files are kept here; in-memory stores when absent */
  readonly dataDir?: string | undefined;
  readonly dispatchLog?: DispatchLogFn | undefined;
  /** Clock override for tests */
  readonly now?: (() => Date) | undefined;
}

export interface ServiceStores {
  readonly aliases: KeyValueStore<AliasRecord>;
  readonly transactions: KeyValueStore<Transaction>;
  readonly subscriptions: KeyValueStore<Subscription>;
  readonly intents: KeyValueStore<IntentRecord>;
}

export function createStores(dataDir: string | undefined): ServiceStores {
  if (dataDir === undefined) {
    return {
      aliases: new InMemoryKeyValueStore(),
      transactions: new InMemoryKeyValueStore(),
      subscriptions: new InMemoryKeyValueStore(),
      intents: new InMemoryKeyValueStore(),
    };
  }
  return {
    aliases: new JsonlKeyValueStore({ filePath: join(dataDir, "aliases.jsonl"), decode: isAliasRecord }),
    transactions: new JsonlKeyValueStore({
      filePath: join(dataDir, "transactions.jsonl"),
      decode: isTransaction,
    }),
    subscriptions: new JsonlKeyValueStore({
      filePath: join(dataDir, "subscriptions.jsonl"),
      decode: isSubscription,
    }),
    intents: new JsonlKeyValueStore({ filePath: join(dataDir, "intents.jsonl"), decode: isIntentRecord }),
  };
}

export interface ServiceStats {
  readonly aliases: number;
  readonly transactions: number;
  readonly subscriptions: number;
}

export interface AddressHistory extends HistoryPage {
  readonly address: CanonicalAddress;
}

/**
 * EIP-712 payload a wallet signs to authorize a payment.
 */
export interface PaymentTypedData {
  readonly domain: AuthorizationDomain;
  readonly types: typeof PAYMENT_AUTHORIZATION_TYPES;
  readonly primaryType: "PaymentAuthorization";
  readonly message: PaymentAuthorizationMessage;
}

export interface WalletCredentials {
  /** X-Wallet-Address; empty when absent */
  readonly address: string;
  /** X-Signature; empty when absent */
  readonly signature: string;
}

function requireWallet(address: string): Result<CanonicalAddress> {
  if (address === "") {
    return fail(authorizationFailure("ADDRESS_MISMATCH", "X-Wallet-Address header is required"));
  }
  return normalizeAddress(address);
}

// =============================================================================
// Service
// =============================================================================

export class AliaspayService {
  readonly version: string;
  readonly authorizer: SignatureAuthorizer;
  readonly registry: AliasRegistry;
  readonly ledger: TransactionLedger;
  readonly subscriptions: SubscriptionBook;
  readonly dispatcher: PaymentDispatcher;
  readonly rail: SettlementRail;
  readonly stores: ServiceStores;

  private readonly _intentParser: IntentParser;
  private readonly _defaultCurrency: string;

  constructor(config: AliaspayServiceConfig, stores: ServiceStores = createStores(config.dataDir)) {
    this.version = config.version;
    this.rail = config.rail;
    this.stores = stores;
    this._intentParser = config.intentParser ?? new UnconfiguredIntentParser();
    this._defaultCurrency = config.defaultCurrency;

    this.authorizer = new SignatureAuthorizer(config.domain);
    this.registry = new AliasRegistry({
      store: stores.aliases,
      authorizer: this.authorizer,
      now: config.now,
    });
    this.ledger = new TransactionLedger({
      store: stores.transactions,
      maxPageSize: config.historyMaxLimit,
    });
    this.subscriptions = new SubscriptionBook({ store: stores.subscriptions, now: config.now });
    this.dispatcher = new PaymentDispatcher({
      registry: this.registry,
      authorizer: this.authorizer,
      ledger: this.ledger,
      subscriptions: this.subscriptions,
      rail: config.rail,
      intents: stores.intents,
      currencies: config.currencies,
      minConfidence: config.minConfidence,
      railTimeoutMs: config.railTimeoutMs,
      explorerUrl: config.explorerUrl,
      log: config.dispatchLog,
      now: config.now,
    });
  }

  // ─── Aliases ───────────────────────────────────────────────────────

  registerAlias(alias: string, address: string, signature: string): Promise<Result<AliasRecord>> {
    return this.registry.register(alias, address, signature);
  }

  seedAliases(entries: readonly SeedEntry[]): Promise<Result<AliasRecord>[]> {
    return this.registry.seed(entries);
  }

  /**
   * Resolve an alias for display. Not a use of the alias: only a
   * dispatched payment refreshes `lastUsedAt`.
   */
  async resolveAlias(
    alias: string,
  ): Promise<Result<{ readonly alias: CanonicalAlias; readonly address: CanonicalAddress }>> {
    const canonical = normalizeAlias(alias);
    if (!canonical.ok) return canonical;

    const record = await this.registry.lookup(canonical.value);
    if (record === undefined) {
      return fail(notFoundFailure("ALIAS_NOT_FOUND", `Alias @${canonical.value} not found`));
    }
    return ok({ alias: canonical.value, address: record.address });
  }

  async aliasOf(
    address: string,
  ): Promise<Result<{ readonly address: CanonicalAddress; readonly alias: CanonicalAlias | undefined }>> {
    const canonical = normalizeAddress(address);
    if (!canonical.ok) return canonical;
    return ok({ address: canonical.value, alias: await this.registry.reverseResolve(canonical.value) });
  }

  searchAliases(query: string, limit: number): Promise<AliasMatch[]> {
    return this.registry.search(query, limit);
  }

  async deleteAlias(alias: string, wallet: WalletCredentials): Promise<Result<CanonicalAlias>> {
    const canonical = normalizeAlias(alias);
    if (!canonical.ok) return canonical;
    const requester = requireWallet(wallet.address);
    if (!requester.ok) return requester;

    const outcome = await this.registry.delete(canonical.value, requester.value, wallet.signature);
    switch (outcome) {
      case "deleted":
        return ok(canonical.value);
      case "not_found":
        return fail(notFoundFailure("ALIAS_NOT_FOUND", `Alias @${canonical.value} not found`));
      case "not_owner":
        return fail(authorizationFailure("NOT_OWNER", "Only the owning address may delete an alias"));
      case "invalid_signature":
        return fail(authorizationFailure("INVALID_SIGNATURE"));
    }
  }

  // ─── Payments ──────────────────────────────────────────────────────

  parseCommand(command: ParseCommand): Promise<Result<WirePaymentIntent>> {
    return this._intentParser.parse(command);
  }

  /**
   * The typed data the caller must sign for `dispatch` to accept the
   * payment. Validates and resolves the intent without executing it.
   */
  async paymentTypedData(request: PaymentMessageDto): Promise<Result<PaymentTypedData>> {
    const intent = toPaymentIntent(request.payment_intent, this._defaultCurrency);
    if (!intent.ok) return intent;
    const from = normalizeAddress(request.user_address);
    if (!from.ok) return from;

    const payment = await this.dispatcher.prepare(intent.value);
    if (!payment.ok) return payment;

    const structured = this.authorizer.buildAuthorizationMessage(
      this.dispatcher.binding(request.intent_id, from.value, payment.value),
    );
    if (structured.primaryType !== "PaymentAuthorization") {
      throw new Error(`Unexpected message type ${structured.primaryType}`);
    }
    return ok({
      domain: this.authorizer.domain,
      types: PAYMENT_AUTHORIZATION_TYPES,
      primaryType: structured.primaryType,
      message: structured.message,
    });
  }

  /**
   * The signature comes from the body; when X-Signature is also sent it
   * must carry the same signature.
   */
  async executePayment(
    request: ExecutePaymentDto,
    wallet: WalletCredentials,
  ): Promise<Result<DispatchResult>> {
    const intent = toPaymentIntent(request.payment_intent, this._defaultCurrency);
    if (!intent.ok) return intent;

    const signature = request.user_signature.trim();
    if (wallet.signature !== "" && wallet.signature !== signature) {
      return fail(authorizationFailure("INVALID_SIGNATURE"));
    }

    return this.dispatcher.dispatch({
      intentId: request.intent_id,
      intent: intent.value,
      authenticatedAddress: wallet.address,
      claimedAddress: request.user_address,
      signature,
    });
  }

  // ─── History ───────────────────────────────────────────────────────

  async history(address: string, limit: number, offset: number): Promise<Result<AddressHistory>> {
    const canonical = normalizeAddress(address);
    if (!canonical.ok) return canonical;
    const page = await this.ledger.history(canonical.value, limit, offset);
    return ok({ ...page, address: canonical.value });
  }

  async transaction(hash: string): Promise<Result<Transaction>> {
    const tx = await this.ledger.getByHash(hash);
    if (tx === undefined) {
      return fail(notFoundFailure("TRANSACTION_NOT_FOUND", `Transaction ${hash} not found`));
    }
    return ok(tx);
  }

  // ─── Subscriptions ─────────────────────────────────────────────────

  async activeSubscriptions(
    address: string,
  ): Promise<Result<{ readonly address: CanonicalAddress; readonly subscriptions: Subscription[] }>> {
    const canonical = normalizeAddress(address);
    if (!canonical.ok) return canonical;
    return ok({
      address: canonical.value,
      subscriptions: await this.subscriptions.listActive(canonical.value),
    });
  }

  /**
   * Cancel on behalf of the payer, proven by an EIP-712
   * `SubscriptionCancellation{id, address}` signature in X-Signature.
   */
  async cancelSubscription(id: string, wallet: WalletCredentials): Promise<Result<Subscription>> {
    const requester = requireWallet(wallet.address);
    if (!requester.ok) return requester;

    const existing = await this.subscriptions.get(id);
    if (existing === undefined || existing.status !== "active") {
      return fail(notFoundFailure("SUBSCRIPTION_NOT_FOUND", `Subscription ${id} not found`));
    }
    if (existing.fromAddress !== requester.value) {
      return fail(authorizationFailure("NOT_OWNER", "Only the paying address may cancel a subscription"));
    }
    const message = this.authorizer.buildCancellationMessage(id, requester.value);
    if (!(await this.authorizer.verify(message, wallet.signature, requester.value))) {
      return fail(authorizationFailure("INVALID_SIGNATURE"));
    }

    const outcome = await this.subscriptions.cancel(id, requester.value);
    const cancelled = outcome === "cancelled" ? await this.subscriptions.get(id) : undefined;
    if (cancelled === undefined) {
      return fail(notFoundFailure("SUBSCRIPTION_NOT_FOUND", `Subscription ${id} not found`));
    }
    return ok(cancelled);
  }

  // ─── Health ────────────────────────────────────────────────────────

  async stats(): Promise<ServiceStats> {
    const [aliases, transactions, subscriptions] = await Promise.all([
      this.registry.count(),
      this.ledger.count(),
      this.subscriptions.count(),
    ]);
    return { aliases, transactions, subscriptions };
  }
}
