/**
 * Tests for release routes: tokens, claims, emergency withdrawal,
 * and the heartbeat monitor.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, DAY, fund, postAs, START } from "./setup.js";
import type { TestApp } from "./setup.js";

const eth = (amount: string) => ({ amount, currency: "ETH", decimals: 0 });

let instance: TestApp;

beforeEach(async () => {
  instance = createTestApp();
  fund(instance, { alice: "1000" });
  // Vault 1: alice → bob, 100, unlocks after a day
  await instance.app.request(
    postAs("alice", "/api/v1/vaults", { beneficiary: "bob", unlockTime: START + DAY, amount: "100" }),
  );
});

// =============================================================================
// Single-beneficiary claim
// =============================================================================

describe("POST /api/v1/vaults/:id/tokens", () => {
  it("mints a token bound to the current beneficiary", async () => {
    const res = await instance.app.request(postAs("alice", "/api/v1/vaults/1/tokens"));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      data: { id: 1, vaultId: 1, beneficiary: "bob", active: true, mintedAt: START },
    });
  });

  it("is owner-only", async () => {
    const res = await instance.app.request(postAs("bob", "/api/v1/vaults/1/tokens"));

    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({ error: { code: "NOT_OWNER" } });
  });
});

describe("POST /api/v1/vaults/:id/claim", () => {
  beforeEach(async () => {
    await instance.app.request(postAs("alice", "/api/v1/vaults/1/tokens"));
  });

  it("returns 409 while the vault is locked", async () => {
    const res = await instance.app.request(postAs("bob", "/api/v1/vaults/1/claim", { tokenId: 1 }));

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ error: { code: "STILL_LOCKED" } });
  });

  it("releases the balance to the beneficiary exactly once", async () => {
    instance.clock.advance(DAY);

    const first = await instance.app.request(postAs("bob", "/api/v1/vaults/1/claim", { tokenId: 1 }));
    expect(first.status).toBe(200);
    expect(await first.json()).toEqual({ data: { beneficiary: "bob", amount: eth("100") } });
    expect(instance.service.balanceOf("bob").balance).toEqual(eth("100"));

    const second = await instance.app.request(postAs("bob", "/api/v1/vaults/1/claim", { tokenId: 1 }));
    expect(second.status).toBe(409);
    expect(await second.json()).toMatchObject({ error: { code: "ALREADY_CLAIMED" } });

    const vault = await instance.app.request("/api/v1/vaults/1");
    expect(await vault.json()).toMatchObject({ data: { claimed: true, balance: eth("0") } });
    const token = await instance.app.request("/api/v1/tokens/1");
    expect(await token.json()).toMatchObject({ data: { active: false } });
  });

  it("returns 403 for a caller who is not the beneficiary", async () => {
    instance.clock.advance(DAY);
    const res = await instance.app.request(postAs("carol", "/api/v1/vaults/1/claim", { tokenId: 1 }));

    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({ error: { code: "NOT_BENEFICIARY" } });
  });

  it("returns 404 for an unknown token", async () => {
    instance.clock.advance(DAY);
    const res = await instance.app.request(postAs("bob", "/api/v1/vaults/1/claim", { tokenId: 7 }));

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: { code: "TOKEN_NOT_FOUND" } });
  });

  it("rejects a token minted for the previous beneficiary", async () => {
    await instance.app.request(postAs("alice", "/api/v1/vaults/1/beneficiary", { beneficiary: "carol" }));
    instance.clock.advance(DAY);

    const res = await instance.app.request(postAs("carol", "/api/v1/vaults/1/claim", { tokenId: 1 }));

    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({ error: { code: "TOKEN_OWNER_MISMATCH" } });
  });
});

// =============================================================================
// Multi-beneficiary claim
// =============================================================================

describe("POST /api/v1/vaults/:id/claim-multi", () => {
  beforeEach(async () => {
    // Vault 2: 10 split 33/33/34
    await instance.app.request(
      postAs("alice", "/api/v1/vaults/multi", {
        beneficiaries: ["bob", "carol", "dave"],
        percentages: [33, 33, 34],
        unlockTime: START + DAY,
        amount: "10",
      }),
    );
  });

  it("pays each share and strands the truncation remainder", async () => {
    instance.clock.advance(DAY);

    const res = await instance.app.request(postAs("erin", "/api/v1/vaults/2/claim-multi"));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        vaultId: 2,
        payouts: [
          { beneficiary: "bob", amount: eth("3"), percentage: 33 },
          { beneficiary: "carol", amount: eth("3"), percentage: 33 },
          { beneficiary: "dave", amount: eth("3"), percentage: 34 },
        ],
        remainder: eth("1"),
      },
    });

    const stats = await instance.app.request("/api/v1/stats");
    expect(await stats.json()).toMatchObject({
      data: { claimedVaults: 1, unallocatedRemainder: eth("1"), totalEscrowed: eth("100") },
    });
    // Vault 1's 100 plus the stranded 1
    expect(instance.service.backend.escrowBalance()).toEqual(eth("101"));
  });

  it("returns 409 for a single-beneficiary vault", async () => {
    instance.clock.advance(DAY);
    const res = await instance.app.request(postAs("bob", "/api/v1/vaults/1/claim-multi"));

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ error: { code: "NOT_MULTI_BENEFICIARY_VAULT" } });
  });
});

// =============================================================================
// Emergency withdrawal
// =============================================================================

describe("POST /api/v1/vaults/:id/emergency-withdraw", () => {
  it("returns the balance to the owner before unlock", async () => {
    const res = await instance.app.request(postAs("alice", "/api/v1/vaults/1/emergency-withdraw"));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { beneficiary: "alice", amount: eth("100") } });
    expect(instance.service.balanceOf("alice").balance).toEqual(eth("1000"));
  });

  it("returns 409 once the vault is unlocked", async () => {
    instance.clock.advance(DAY);
    const res = await instance.app.request(postAs("alice", "/api/v1/vaults/1/emergency-withdraw"));

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ error: { code: "VAULT_UNLOCKED" } });
  });
});

// =============================================================================
// Heartbeat
// =============================================================================

describe("heartbeat routes", () => {
  const THIRTY_DAYS = 30 * DAY;

  it("enables, reports and records heartbeats", async () => {
    const enabled = await instance.app.request(
      postAs("alice", "/api/v1/vaults/1/heartbeat/enable", { interval: THIRTY_DAYS }),
    );
    expect(enabled.status).toBe(200);
    expect(await enabled.json()).toMatchObject({
      data: { heartbeatEnabled: true, heartbeatInterval: THIRTY_DAYS, lastHeartbeatAt: START },
    });

    instance.clock.advance(THIRTY_DAYS + 1);
    const overdue = await instance.app.request("/api/v1/vaults/1/heartbeat");
    expect(await overdue.json()).toEqual({
      data: {
        vaultId: 1,
        enabled: true,
        interval: THIRTY_DAYS,
        lastHeartbeatAt: START,
        nextDeadline: START + THIRTY_DAYS,
        overdue: true,
        secondsUntilDeadline: -1,
      },
    });

    const recorded = await instance.app.request(postAs("alice", "/api/v1/vaults/1/heartbeat"));
    expect(await recorded.json()).toMatchObject({
      data: { lastHeartbeatAt: START + THIRTY_DAYS + 1 },
    });
    const status = await instance.app.request("/api/v1/vaults/1/status");
    expect(await status.json()).toMatchObject({ data: { heartbeatOverdue: false } });
  });

  it("rejects an interval shorter than thirty days", async () => {
    const res = await instance.app.request(
      postAs("alice", "/api/v1/vaults/1/heartbeat/enable", { interval: THIRTY_DAYS - 1 }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "INVALID_INTERVAL" } });
  });

  it("returns 409 when recording before enabling", async () => {
    const res = await instance.app.request(postAs("alice", "/api/v1/vaults/1/heartbeat"));

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ error: { code: "HEARTBEAT_NOT_ENABLED" } });
  });
});
