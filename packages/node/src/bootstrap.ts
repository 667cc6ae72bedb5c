/**
 * Turns validated configuration into the service's collaborators.
 */

import { CircleRail, SimulatedRail } from "@aliaspay/dispatcher";
import type { DispatchLogFn, SettlementRail } from "@aliaspay/dispatcher";
import type { AppConfig } from "./config.js";
import { parseCurrencies } from "./config.js";
import { HttpIntentParser } from "./services/intent-parser.js";
import type { AliaspayServiceConfig } from "./services/aliaspay-service.js";

export interface BootstrapOptions {
  readonly dispatchLog?: DispatchLogFn | undefined;
  /** Used by the Circle rail and the intent parser (for testing) */
  readonly fetchFn?: typeof fetch | undefined;
}

export function createRail(config: AppConfig, fetchFn?: typeof fetch): SettlementRail {
  if (config.RAIL === "simulated") {
    return new SimulatedRail();
  }
  return new CircleRail({
    apiKey: config.CIRCLE_API_KEY ?? "",
    baseUrl: config.CIRCLE_BASE_URL,
    entityId: config.CIRCLE_ENTITY_ID ?? "",
    walletId: config.CIRCLE_WALLET_ID ?? "",
    fetchFn,
  });
}

export function buildServiceConfig(
  config: AppConfig,
  options: BootstrapOptions = {},
): AliaspayServiceConfig {
  return {
    version: config.SERVICE_VERSION,
    domain: {
      name: config.SERVICE_NAME,
      version: config.SERVICE_VERSION,
      chainId: config.CHAIN_ID,
      verifyingContract: config.VERIFYING_CONTRACT,
    },
    currencies: parseCurrencies(config.SUPPORTED_CURRENCIES),
    defaultCurrency: config.DEFAULT_CURRENCY,
    minConfidence: config.MIN_CONFIDENCE,
    rail: createRail(config, options.fetchFn),
    railTimeoutMs: config.RAIL_TIMEOUT_MS,
    explorerUrl: config.EXPLORER_URL,
    historyMaxLimit: config.HISTORY_MAX_LIMIT,
    intentParser:
      config.INTENT_PARSER_URL !== undefined
        ? new HttpIntentParser({
            url: config.INTENT_PARSER_URL,
            timeoutMs: config.INTENT_PARSER_TIMEOUT_MS,
            fetchFn: options.fetchFn,
          })
        : undefined,
    dataDir: config.DATA_DIR,
    dispatchLog: options.dispatchLog,
  };
}
