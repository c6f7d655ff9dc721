/**
 * Tests for config.ts — parseApiKeys + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { parseApiKeys, loadConfig } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses a single key entry", () => {
    expect(parseApiKeys("test-key-1:alice:admin")).toEqual([
      { key: "test-key-1", identity: "alice", role: "admin" },
    ]);
  });

  it("parses multiple comma-separated entries and trims whitespace", () => {
    expect(parseApiKeys("  k1:alice:admin , k2:bob:member  ")).toEqual([
      { key: "k1", identity: "alice", role: "admin" },
      { key: "k2", identity: "bob", role: "member" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("k1:alice")).toThrow(
      'Invalid API_KEYS entry: "k1:alice". Expected format: key:identity:role',
    );
    expect(() => parseApiKeys("k1:alice:admin:extra")).toThrow("Expected format");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(":alice:admin")).toThrow("API key cannot be empty");
  });

  it("throws on empty identity", () => {
    expect(() => parseApiKeys("k1::admin")).toThrow('Invalid identity "" in API_KEYS');
  });

  it("throws on unknown role", () => {
    expect(() => parseApiKeys("k1:alice:viewer")).toThrow(
      'Invalid role "viewer" in API_KEYS. Must be: admin or member',
    );
  });

  it("throws on duplicate keys", () => {
    expect(() => parseApiKeys("k1:alice:admin,k1:bob:member")).toThrow(
      'Duplicate API key in API_KEYS: "k1"',
    );
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      API_KEYS: "",
      CURRENCY: "ETH",
      DECIMALS: 18,
      ESCROW_ACCOUNT: "escrow",
      IDEMPOTENCY_TTL_MS: 86400000,
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ PORT: "8080", DECIMALS: "6", IDEMPOTENCY_TTL_MS: "5000" });
    expect(config.PORT).toBe(8080);
    expect(config.DECIMALS).toBe(6);
    expect(config.IDEMPOTENCY_TTL_MS).toBe(5000);
  });

  it("keeps optional paths when set", () => {
    const config = loadConfig({ EVENT_LOG_PATH: "/var/lib/keepsake/facts.jsonl", STATE_PATH: "/var/lib/keepsake/state.json" });
    expect(config.EVENT_LOG_PATH).toBe("/var/lib/keepsake/facts.jsonl");
    expect(config.STATE_PATH).toBe("/var/lib/keepsake/state.json");
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow(ZodError);
    expect(() => loadConfig({ DECIMALS: "19" })).toThrow(ZodError);
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
    expect(() => loadConfig({ IDEMPOTENCY_TTL_MS: "10" })).toThrow(ZodError);
  });
});
