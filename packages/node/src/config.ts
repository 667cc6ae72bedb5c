/**
 * @aliaspay/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { CurrencySpec } from "@aliaspay/types";
import type { SeedEntry } from "@aliaspay/directory";

// =============================================================================
// Schema
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Signing domain
    SERVICE_NAME: z.string().min(1).default("aliaspay"),
    SERVICE_VERSION: z.string().min(1).default("1.0.0"),
    CHAIN_ID: z.coerce.number().int().min(1).default(4224),
    VERIFYING_CONTRACT: z
      .string()
      .regex(ADDRESS_PATTERN, "must be 0x followed by 40 hex characters")
      .default("0x0000000000000000000000000000000000000000"),
    EXPLORER_URL: z.string().url().optional(),

    // Payments
    SUPPORTED_CURRENCIES: z.string().default("USDC:6,EURC:6"),
    DEFAULT_CURRENCY: z.string().min(1).default("USDC"),
    MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.5),

    // Settlement rail
    RAIL: z.enum(["simulated", "circle"]).default("simulated"),
    CIRCLE_API_KEY: z.string().optional(),
    CIRCLE_BASE_URL: z.string().url().default("https://api.circle.com/v1/w3s"),
    CIRCLE_ENTITY_ID: z.string().optional(),
    CIRCLE_WALLET_ID: z.string().optional(),
    RAIL_TIMEOUT_MS: z.coerce.number().int().min(100).default(30_000),

    // Intent parser
    INTENT_PARSER_URL: z.string().url().optional(),
    INTENT_PARSER_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),

    // Storage
    DATA_DIR: z.string().optional(),
    HISTORY_MAX_LIMIT: z.coerce.number().int().min(1).max(1000).default(100),
    SEED_ALIASES: z.string().default(""),
  })
  .superRefine((config, ctx) => {
    if (config.RAIL !== "circle") {
      return;
    }
    for (const key of ["CIRCLE_API_KEY", "CIRCLE_ENTITY_ID", "CIRCLE_WALLET_ID"] as const) {
      if (config[key] === undefined || config[key] === "") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when RAIL=circle`,
        });
      }
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// List Parsing
// =============================================================================

/**
 * Parse the SUPPORTED_CURRENCIES env var.
 *
 * Format: "USDC:6,EURC:6". Symbols are upper-cased.
 */
export function parseCurrencies(raw: string): readonly CurrencySpec[] {
  const currencies: CurrencySpec[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (trimmed === "") {
      continue;
    }

    const match = /^([A-Za-z][A-Za-z0-9]{1,11}):(\d{1,2})$/.exec(trimmed);
    if (match === null) {
      throw new Error(
        `Invalid SUPPORTED_CURRENCIES entry: "${trimmed}". Expected format: SYMBOL:decimals`,
      );
    }

    const symbol = (match[1] ?? "").toUpperCase();
    const decimals = Number(match[2]);
    if (decimals > 18) {
      throw new Error(`Currency ${symbol} has ${decimals} decimals; at most 18 are supported`);
    }
    if (seen.has(symbol)) {
      throw new Error(`Currency ${symbol} is listed twice in SUPPORTED_CURRENCIES`);
    }

    seen.add(symbol);
    currencies.push({ symbol, decimals });
  }

  if (currencies.length === 0) {
    throw new Error("SUPPORTED_CURRENCIES must name at least one currency");
  }

  return currencies;
}

/**
 * Parse the SEED_ALIASES env var.
 *
 * Format: "alice:0x…,bob:0x…". Values are checked by the registry when
 * seeded, not here.
 */
export function parseSeedAliases(raw: string): readonly SeedEntry[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const trimmed = entry.trim();
    const separator = trimmed.indexOf(":");
    if (separator <= 0 || separator === trimmed.length - 1) {
      throw new Error(
        `Invalid SEED_ALIASES entry: "${trimmed}". Expected format: alias:address`,
      );
    }
    return {
      alias: trimmed.slice(0, separator).trim(),
      address: trimmed.slice(separator + 1).trim(),
    };
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const config = ConfigSchema.parse(env);
  const currencies = parseCurrencies(config.SUPPORTED_CURRENCIES);
  const defaultCurrency = config.DEFAULT_CURRENCY.toUpperCase();
  if (!currencies.some((c) => c.symbol === defaultCurrency)) {
    throw new Error(`DEFAULT_CURRENCY ${defaultCurrency} is not in SUPPORTED_CURRENCIES`);
  }
  return { ...config, DEFAULT_CURRENCY: defaultCurrency };
}
