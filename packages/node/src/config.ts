/**
 * @tollgate/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { AssetDescriptor } from "@tollgate/types";
import type { HookPolicy } from "@tollgate/ledger";
import type { Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

/** Non-negative integer string, kept as bigint. */
const BigIntString = z
  .string()
  .trim()
  .regex(/^\d+$/, "Expected a non-negative integer")
  .transform((v) => BigInt(v));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Asset
  ASSET_NAME: z.string().trim().min(1).default("Gated Dollar"),
  ASSET_SYMBOL: z.string().trim().min(1).default("GUSD"),
  ASSET_DECIMALS: z.coerce.number().int().min(0).max(255).default(8),
  ASSET_MAX_SUPPLY: BigIntString.optional(),
  ASSET_ICON_URI: z.string().optional(),
  ASSET_PROJECT_URI: z.string().optional(),
  ASSET_ADMIN: z.string().trim().min(1).default("admin"),

  // Hook policy
  CAP_RATE: BigIntString.default("200"),
  SCALE_FACTOR: BigIntString.refine((v) => v > 0n, "SCALE_FACTOR must be positive").default("100"),
  MINIMUM_REFERENCE_BALANCE: BigIntString.default("1000"),

  // Event log (in-memory when unset)
  EVENT_LOG_PATH: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived settings
// =============================================================================

export function assetFromConfig(config: AppConfig): AssetDescriptor {
  return {
    name: config.ASSET_NAME,
    symbol: config.ASSET_SYMBOL,
    decimals: config.ASSET_DECIMALS,
    ...(config.ASSET_MAX_SUPPLY !== undefined ? { maxSupply: config.ASSET_MAX_SUPPLY } : {}),
    ...(config.ASSET_ICON_URI !== undefined ? { iconUri: config.ASSET_ICON_URI } : {}),
    ...(config.ASSET_PROJECT_URI !== undefined ? { projectUri: config.ASSET_PROJECT_URI } : {}),
  };
}

export function policyFromConfig(config: AppConfig): HookPolicy {
  return {
    capRate: config.CAP_RATE,
    scaleFactor: config.SCALE_FACTOR,
    minimumReferenceBalance: config.MINIMUM_REFERENCE_BALANCE,
  };
}

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly accountId: string;
}

function isRole(value: string): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:account1,key2:role2:account2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, accountId] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || accountId === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:accountId`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (accountId === "") {
      throw new Error("Account ID cannot be empty in API_KEYS");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }
    seen.add(key);

    keys.push({ key, role, accountId });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
