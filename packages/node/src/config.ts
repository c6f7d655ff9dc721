/**
 * @keepsake/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isIdentity } from "@keepsake/types";
import type { Role } from "./types/auth.js";
import { isRole } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

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

  // Value ledger
  CURRENCY: z.string().min(1).default("ETH"),
  DECIMALS: z.coerce.number().int().min(0).max(18).default(18),
  ESCROW_ACCOUNT: z.string().min(1).default("escrow"),

  // Fact log (JSONL). In-memory only when unset.
  EVENT_LOG_PATH: z.string().min(1).optional(),
  // Vault and value state snapshot, restored at startup and saved on shutdown
  STATE_PATH: z.string().min(1).optional(),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly identity: string;
  readonly role: Role;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:identity1:role1,key2:identity2:role2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, identity, role] = parts;
    if (parts.length !== 3 || key === undefined || identity === undefined || role === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:identity:role`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }
    if (!isIdentity(identity)) {
      throw new Error(`Invalid identity "${identity}" in API_KEYS`);
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin or member`,
      );
    }

    seen.add(key);
    keys.push({ key, identity, role });
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
