/**
 * Tests for idempotency middleware and its in-memory store.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, DAY, fund, jsonRequest, postAs, START } from "../setup.js";
import type { TestApp } from "../setup.js";
import { InMemoryIdempotencyStore } from "../../src/middleware/idempotency.js";

const body = { beneficiary: "bob", unlockTime: START + DAY, amount: "100" };

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
  fund(instance, { alice: "1000", carol: "1000" });
});

describe("idempotency middleware", () => {
  it("replays the response for a repeated key without re-executing", async () => {
    const { app, service } = instance;
    const headers = { "Idempotency-Key": "key-123" };

    const res1 = await app.request(postAs("alice", "/api/v1/vaults", body, headers));
    expect(res1.status).toBe(201);
    expect(res1.headers.get("X-Idempotent-Replay")).toBeNull();

    const res2 = await app.request(postAs("alice", "/api/v1/vaults", body, headers));
    expect(res2.status).toBe(201);
    expect(res2.headers.get("X-Idempotent-Replay")).toBe("true");
    expect(await res2.json()).toEqual(await res1.json());

    expect(service.vaults.getContractStats().totalVaults).toBe(1);
    expect(service.balanceOf("alice").balance.amount).toBe("900");
  });

  it("scopes keys to the caller", async () => {
    const { app, service } = instance;
    const headers = { "Idempotency-Key": "shared-key" };

    await app.request(postAs("alice", "/api/v1/vaults", body, headers));
    const res = await app.request(postAs("carol", "/api/v1/vaults", body, headers));

    expect(res.headers.get("X-Idempotent-Replay")).toBeNull();
    expect(await res.json()).toMatchObject({ data: { id: 2, owner: "carol" } });
    expect(service.vaults.getContractStats().totalVaults).toBe(2);
  });

  it("scopes keys to the route", async () => {
    const { app } = instance;
    const headers = { "Idempotency-Key": "route-key" };

    await app.request(postAs("alice", "/api/v1/vaults", body, headers));
    const res = await app.request(postAs("alice", "/api/v1/vaults/1/message", { note: "hi" }, headers));

    expect(res.status).toBe(200);
    expect(res.headers.get("X-Idempotent-Replay")).toBeNull();
  });

  it("does not cache failed responses", async () => {
    const { app } = instance;
    const headers = { "Idempotency-Key": "retry-key" };
    const tooMuch = { ...body, amount: "5000" };

    const res1 = await app.request(postAs("alice", "/api/v1/vaults", tooMuch, headers));
    expect(res1.status).toBe(502);

    const res2 = await app.request(postAs("alice", "/api/v1/vaults", body, headers));
    expect(res2.status).toBe(201);
    expect(res2.headers.get("X-Idempotent-Replay")).toBeNull();
  });

  it("does not cache GET requests", async () => {
    const { app, idempotencyStore } = instance;
    await app.request(jsonRequest("/api/v1/stats", "GET", undefined, { "Idempotency-Key": "get-key" }));

    expect(idempotencyStore.size).toBe(0);
  });

  it("does not cache POST without Idempotency-Key", async () => {
    const { app, idempotencyStore } = instance;
    await app.request(postAs("alice", "/api/v1/vaults", body));

    expect(idempotencyStore.size).toBe(0);
  });
});

describe("InMemoryIdempotencyStore", () => {
  it("expires entries after the TTL", () => {
    let now = 10_000;
    const store = new InMemoryIdempotencyStore(1_000, () => now);
    store.set("k", { status: 201, body: "{}", headers: {} });

    now += 1_000;
    expect(store.get("k")).toMatchObject({ status: 201 });

    now += 1;
    expect(store.get("k")).toBeUndefined();
    expect(store.size).toBe(0);
  });
});
