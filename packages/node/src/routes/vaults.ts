/**
 * Vault routes.
 *
 * POST /api/v1/vaults                              — Create a single-beneficiary vault
 * POST /api/v1/vaults/multi                        — Create a multi-beneficiary vault
 * GET  /api/v1/vaults/:id                          — Vault record
 * GET  /api/v1/vaults/:id/status                   — Lock / claim / heartbeat summary
 * GET  /api/v1/vaults/:id/beneficiaries            — Share list
 * POST /api/v1/vaults/:id/funds                    — Add funds
 * POST /api/v1/vaults/:id/extend                   — Push the unlock time later
 * POST /api/v1/vaults/:id/beneficiary              — Replace the beneficiary
 * POST /api/v1/vaults/:id/message                  — Set the note
 * POST /api/v1/vaults/:id/tokens                   — Mint an inheritance token
 * POST /api/v1/vaults/:id/claim                    — Claim with a token
 * POST /api/v1/vaults/:id/claim-multi              — Release to every share
 * POST /api/v1/vaults/:id/emergency-withdraw       — Owner withdrawal before unlock
 * POST /api/v1/vaults/:id/heartbeat/enable         — Enable proof-of-life
 * POST /api/v1/vaults/:id/heartbeat                — Record proof-of-life
 * GET  /api/v1/vaults/:id/heartbeat                — Heartbeat status
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddFundsSchema,
  ClaimVaultSchema,
  CreateMultiBeneficiaryVaultSchema,
  CreateVaultSchema,
  EnableHeartbeatSchema,
  ExtendVaultSchema,
  IdParamSchema,
  SetMessageSchema,
  UpdateBeneficiarySchema,
} from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";

function vaultIdOf(c: Context<AppEnv>): number {
  return IdParamSchema.parse(c.req.param("id"));
}

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Creation ─────────────────────────────────────────────────────

  routes.post("/", async (c) => {
    const { vaults } = c.get("service");
    const body = await parseBody(c, CreateVaultSchema);
    const id = await vaults.createVault(
      c.get("auth").identity,
      body.beneficiary,
      body.unlockTime,
      body.amount,
    );
    return c.json({ data: vaults.getVaultDetails(id) }, 201);
  });

  routes.post("/multi", async (c) => {
    const { vaults } = c.get("service");
    const body = await parseBody(c, CreateMultiBeneficiaryVaultSchema);
    const id = await vaults.createMultiBeneficiaryVault(
      c.get("auth").identity,
      body.beneficiaries,
      body.percentages,
      body.unlockTime,
      body.amount,
    );
    return c.json(
      {
        data: {
          vault: vaults.getVaultDetails(id),
          beneficiaries: vaults.getVaultBeneficiaries(id),
        },
      },
      201,
    );
  });

  // ─── Queries ──────────────────────────────────────────────────────

  routes.get("/:id", (c) => {
    const { vaults } = c.get("service");
    return c.json({ data: vaults.getVaultDetails(vaultIdOf(c)) });
  });

  routes.get("/:id/status", (c) => {
    const { vaults } = c.get("service");
    return c.json({ data: vaults.getVaultStatus(vaultIdOf(c)) });
  });

  routes.get("/:id/beneficiaries", (c) => {
    const { vaults } = c.get("service");
    return c.json({ data: vaults.getVaultBeneficiaries(vaultIdOf(c)) });
  });

  routes.get("/:id/heartbeat", (c) => {
    const { vaults } = c.get("service");
    return c.json({ data: vaults.getHeartbeatStatus(vaultIdOf(c)) });
  });

  // ─── Owner configuration ──────────────────────────────────────────

  routes.post("/:id/funds", async (c) => {
    const { vaults } = c.get("service");
    const vaultId = vaultIdOf(c);
    const body = await parseBody(c, AddFundsSchema);
    return c.json({ data: await vaults.addFunds(c.get("auth").identity, vaultId, body.amount) });
  });

  routes.post("/:id/extend", async (c) => {
    const { vaults } = c.get("service");
    const vaultId = vaultIdOf(c);
    const body = await parseBody(c, ExtendVaultSchema);
    return c.json({
      data: await vaults.extendVaultTime(c.get("auth").identity, vaultId, body.unlockTime),
    });
  });

  routes.post("/:id/beneficiary", async (c) => {
    const { vaults } = c.get("service");
    const vaultId = vaultIdOf(c);
    const body = await parseBody(c, UpdateBeneficiarySchema);
    return c.json({
      data: await vaults.updateBeneficiary(c.get("auth").identity, vaultId, body.beneficiary),
    });
  });

  routes.post("/:id/message", async (c) => {
    const { vaults } = c.get("service");
    const vaultId = vaultIdOf(c);
    const body = await parseBody(c, SetMessageSchema);
    return c.json({ data: await vaults.setMessage(c.get("auth").identity, vaultId, body.note) });
  });

  // ─── Release ──────────────────────────────────────────────────────

  routes.post("/:id/tokens", async (c) => {
    const { vaults } = c.get("service");
    const tokenId = await vaults.mintInheritanceToken(c.get("auth").identity, vaultIdOf(c));
    return c.json({ data: vaults.getTokenDetails(tokenId) }, 201);
  });

  routes.post("/:id/claim", async (c) => {
    const { vaults } = c.get("service");
    const vaultId = vaultIdOf(c);
    const body = await parseBody(c, ClaimVaultSchema);
    return c.json({
      data: await vaults.claimVault(c.get("auth").identity, vaultId, body.tokenId),
    });
  });

  routes.post("/:id/claim-multi", async (c) => {
    const { vaults } = c.get("service");
    return c.json({
      data: await vaults.claimMultiBeneficiaryVault(c.get("auth").identity, vaultIdOf(c)),
    });
  });

  routes.post("/:id/emergency-withdraw", async (c) => {
    const { vaults } = c.get("service");
    return c.json({
      data: await vaults.emergencyWithdraw(c.get("auth").identity, vaultIdOf(c)),
    });
  });

  // ─── Heartbeat ────────────────────────────────────────────────────

  routes.post("/:id/heartbeat/enable", async (c) => {
    const { vaults } = c.get("service");
    const vaultId = vaultIdOf(c);
    const body = await parseBody(c, EnableHeartbeatSchema);
    return c.json({
      data: await vaults.enableHeartbeat(c.get("auth").identity, vaultId, body.interval),
    });
  });

  routes.post("/:id/heartbeat", async (c) => {
    const { vaults } = c.get("service");
    return c.json({
      data: await vaults.recordHeartbeat(c.get("auth").identity, vaultIdOf(c)),
    });
  });

  return routes;
}
