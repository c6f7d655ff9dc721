/**
 * Tests for the heartbeat monitor.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  MAX_HEARTBEAT_INTERVAL,
  MIN_HEARTBEAT_INTERVAL,
  heartbeatStatus,
  isValidHeartbeatInterval,
} from "../src/heartbeat.js";
import { createHarness, codeOf, DAY, START } from "./fixtures.js";
import type { Harness } from "./fixtures.js";

let h: Harness;
let id: number;

beforeEach(async () => {
  h = createHarness();
  id = await h.ledger.createVault("alice", "bob", START + 400 * DAY, "100");
});

describe("interval bounds", () => {
  it("spans 30 to 365 days inclusive", () => {
    expect(MIN_HEARTBEAT_INTERVAL).toBe(2_592_000);
    expect(MAX_HEARTBEAT_INTERVAL).toBe(31_536_000);
    expect(isValidHeartbeatInterval(MIN_HEARTBEAT_INTERVAL)).toBe(true);
    expect(isValidHeartbeatInterval(MAX_HEARTBEAT_INTERVAL)).toBe(true);
    expect(isValidHeartbeatInterval(MIN_HEARTBEAT_INTERVAL - 1)).toBe(false);
    expect(isValidHeartbeatInterval(MAX_HEARTBEAT_INTERVAL + 1)).toBe(false);
    expect(isValidHeartbeatInterval(MIN_HEARTBEAT_INTERVAL + 0.5)).toBe(false);
  });
});

describe("enableHeartbeat", () => {
  it("starts the deadline now", async () => {
    h.clock.advance(100);
    const vault = await h.ledger.enableHeartbeat("alice", id, 30 * DAY);

    expect(vault).toMatchObject({
      heartbeatEnabled: true,
      heartbeatInterval: 30 * DAY,
      lastHeartbeatAt: START + 100,
    });
    expect(h.events.read("vault-1").at(-1)?.event).toMatchObject({
      type: "vault.heartbeat_enabled",
      payload: { vaultId: id, interval: 30 * DAY, at: START + 100 },
    });
  });

  it("rejects intervals out of range", async () => {
    expect(await codeOf(h.ledger.enableHeartbeat("alice", id, 29 * DAY))).toBe("INVALID_INTERVAL");
    expect(await codeOf(h.ledger.enableHeartbeat("alice", id, 366 * DAY))).toBe("INVALID_INTERVAL");
  });

  it("is owner-only", async () => {
    expect(await codeOf(h.ledger.enableHeartbeat("bob", id, 30 * DAY))).toBe("NOT_OWNER");
  });
});

describe("recordHeartbeat", () => {
  it("requires heartbeat to be enabled", async () => {
    expect(await codeOf(h.ledger.recordHeartbeat("alice", id))).toBe("HEARTBEAT_NOT_ENABLED");
  });

  it("moves the deadline forward", async () => {
    await h.ledger.enableHeartbeat("alice", id, 30 * DAY);
    h.clock.advance(20 * DAY);
    await h.ledger.recordHeartbeat("alice", id);
    h.clock.advance(20 * DAY);

    expect(h.ledger.isHeartbeatOverdue(id)).toBe(false);
    expect(h.ledger.getHeartbeatStatus(id)).toEqual({
      vaultId: id,
      enabled: true,
      interval: 30 * DAY,
      lastHeartbeatAt: START + 20 * DAY,
      nextDeadline: START + 50 * DAY,
      overdue: false,
      secondsUntilDeadline: 10 * DAY,
    });
  });

  it("is refused after the vault is claimed", async () => {
    await h.ledger.enableHeartbeat("alice", id, 30 * DAY);
    await h.ledger.emergencyWithdraw("alice", id);

    expect(await codeOf(h.ledger.recordHeartbeat("alice", id))).toBe("ALREADY_CLAIMED");
  });
});

describe("isHeartbeatOverdue", () => {
  it("turns true only after the interval elapses (scenario E)", async () => {
    await h.ledger.enableHeartbeat("alice", id, 30 * DAY);

    h.clock.advance(30 * DAY - 1);
    expect(h.ledger.isHeartbeatOverdue(id)).toBe(false);
    h.clock.advance(1);
    expect(h.ledger.isHeartbeatOverdue(id)).toBe(false);
    h.clock.advance(1);
    expect(h.ledger.isHeartbeatOverdue(id)).toBe(true);
    expect(h.ledger.getVaultStatus(id).heartbeatOverdue).toBe(true);
  });

  it("is false while disabled, however much time passes", () => {
    h.clock.advance(10_000 * DAY);
    expect(h.ledger.isHeartbeatOverdue(id)).toBe(false);
    expect(h.ledger.getHeartbeatStatus(id)).toMatchObject({
      enabled: false,
      nextDeadline: null,
      secondsUntilDeadline: null,
    });
  });

  it("throws VAULT_NOT_FOUND for an unknown vault", () => {
    expect(() => h.ledger.isHeartbeatOverdue(404)).toThrow("Vault 404 not found");
  });

  it("reports a negative countdown once overdue", () => {
    const status = heartbeatStatus(
      { ...h.ledger.getVaultDetails(id), heartbeatEnabled: true, heartbeatInterval: 30 * DAY, lastHeartbeatAt: START },
      START + 31 * DAY,
    );
    expect(status.overdue).toBe(true);
    expect(status.secondsUntilDeadline).toBe(-DAY);
  });
});
