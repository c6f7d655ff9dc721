/**
 * Tests for fact query routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, DAY, fund, postAs, START } from "./setup.js";
import type { TestApp } from "./setup.js";
import { encodeCursor } from "../src/types/pagination.js";

let instance: TestApp;

beforeEach(async () => {
  instance = createTestApp();
  fund(instance, { alice: "1000" });
  const { app } = instance;
  // Facts 1..4: vault 1 created, vault 2 created, vault 1 funded, token minted on vault 1
  await app.request(postAs("alice", "/api/v1/vaults", { beneficiary: "bob", unlockTime: START + DAY, amount: "10" }));
  await app.request(postAs("alice", "/api/v1/vaults", { beneficiary: "carol", unlockTime: START + DAY, amount: "10" }));
  await app.request(postAs("alice", "/api/v1/vaults/1/funds", { amount: "5" }));
  await app.request(postAs("alice", "/api/v1/vaults/1/tokens"));
});

describe("GET /api/v1/events", () => {
  it("returns facts in commit order", async () => {
    const res = await instance.app.request("/api/v1/events");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: [
        { globalPosition: 1, streamId: "vault-1", event: { type: "vault.created" } },
        { globalPosition: 2, streamId: "vault-2", event: { type: "vault.created" } },
        { globalPosition: 3, streamId: "vault-1", event: { type: "vault.funded" } },
        { globalPosition: 4, streamId: "vault-1", event: { type: "vault.token_minted" } },
      ],
      pagination: { cursor: null, hasMore: false },
    });
  });

  it("records the caller and source in fact metadata", async () => {
    const res = await instance.app.request("/api/v1/events?limit=1");

    expect(await res.json()).toMatchObject({
      data: [
        {
          appendedAt: new Date(START * 1000).toISOString(),
          event: {
            metadata: { actor: "alice", source: "ledger", timestamp: new Date(START * 1000).toISOString() },
            payload: { vaultId: 1, owner: "alice", beneficiary: "bob", amount: "10", currency: "ETH" },
          },
        },
      ],
    });
  });

  it("pages with a cursor", async () => {
    const first = await instance.app.request("/api/v1/events?limit=3");
    expect(await first.json()).toMatchObject({
      pagination: { cursor: encodeCursor("globalPosition", 3), hasMore: true },
    });

    const second = await instance.app.request(
      `/api/v1/events?limit=3&cursor=${encodeCursor("globalPosition", 3)}`,
    );
    expect(await second.json()).toMatchObject({
      data: [{ globalPosition: 4 }],
      pagination: { cursor: null, hasMore: false },
    });
  });

  it("starts after a given position", async () => {
    const res = await instance.app.request("/api/v1/events?afterPosition=2");
    expect(await res.json()).toMatchObject({
      data: [{ globalPosition: 3 }, { globalPosition: 4 }],
    });
  });

  it("returns 400 for an invalid limit", async () => {
    const res = await instance.app.request("/api/v1/events?limit=0");

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "VALIDATION_ERROR" } });
  });

  it("returns 400 for a cursor from another listing", async () => {
    const res = await instance.app.request(`/api/v1/events?cursor=${encodeCursor("version", 1)}`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "VALIDATION_ERROR", message: "Invalid pagination cursor" },
    });
  });
});

describe("GET /api/v1/events/:streamId", () => {
  it("returns one vault's facts with stream versions", async () => {
    const res = await instance.app.request("/api/v1/events/vault-1");

    expect(await res.json()).toMatchObject({
      data: [
        { version: 1, event: { type: "vault.created" } },
        { version: 2, event: { type: "vault.funded", payload: { amount: "5", newBalance: "15" } } },
        { version: 3, event: { type: "vault.token_minted", payload: { tokenId: 1, beneficiary: "bob" } } },
      ],
    });
  });

  it("starts after a given version", async () => {
    const res = await instance.app.request("/api/v1/events/vault-1?afterVersion=2");
    expect(await res.json()).toMatchObject({ data: [{ version: 3 }] });
  });

  it("is empty for an unknown stream", async () => {
    const res = await instance.app.request("/api/v1/events/vault-99");
    expect(await res.json()).toEqual({ data: [], pagination: { cursor: null, hasMore: false } });
  });
});
