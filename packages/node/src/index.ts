/**
 * @aliaspay/node — Hono HTTP service.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { AliaspayService, createStores } from "./services/aliaspay-service.js";
export type {
  AliaspayServiceConfig,
  ServiceStores,
  ServiceStats,
  AddressHistory,
  PaymentTypedData,
  WalletCredentials,
} from "./services/aliaspay-service.js";
export { HttpIntentParser, UnconfiguredIntentParser } from "./services/intent-parser.js";
export type { IntentParser, ParseCommand, HttpIntentParserConfig } from "./services/intent-parser.js";
export { loadConfig, parseCurrencies, parseSeedAliases, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { buildServiceConfig, createRail } from "./bootstrap.js";
export type { BootstrapOptions } from "./bootstrap.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
