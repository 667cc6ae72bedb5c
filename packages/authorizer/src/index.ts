/**
 * @aliaspay/authorizer — Signature authorization.
 *
 * Provides:
 * - EIP-712 message builders for payments, alias ownership and cancellations
 * - SignatureAuthorizer (fail-closed verification, canonical digests)
 * - signStructuredMessage for wallets and tests
 *
 * @packageDocumentation
 */

export type {
  AuthorizationDomain,
  AuthorizationBinding,
  RecipientBinding,
  PaymentAuthorizationMessage,
  AliasOwnershipMessage,
  SubscriptionCancellationMessage,
  StructuredMessage,
} from "./messages.js";
export {
  PAYMENT_AUTHORIZATION_TYPES,
  ALIAS_REGISTRATION_TYPES,
  ALIAS_DELETION_TYPES,
  SUBSCRIPTION_CANCELLATION_TYPES,
  buildAuthorizationMessage,
  buildRegistrationMessage,
  buildDeletionMessage,
  buildCancellationMessage,
} from "./messages.js";
export { isStructuredMessage } from "./guards.js";

export { toTypedDataDomain, recoverSigner, signStructuredMessage } from "./typed-data.js";

export { SignatureAuthorizer } from "./authorizer.js";
