/**
 * Cross-vault query routes.
 *
 * GET /api/v1/owners/:identity/vaults         — Vault ids created by an owner
 * GET /api/v1/beneficiaries/:identity/vaults  — Vault ids an identity currently benefits from
 * GET /api/v1/tokens/:id                      — Inheritance token
 * GET /api/v1/stats                           — Aggregate counters
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { IdentitySchema, IdParamSchema } from "../types/dto.js";

export function createRegistryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/owners/:identity/vaults", (c) => {
    const owner = IdentitySchema.parse(c.req.param("identity"));
    return c.json({ data: c.get("service").vaults.getOwnerVaults(owner) });
  });

  routes.get("/beneficiaries/:identity/vaults", (c) => {
    const beneficiary = IdentitySchema.parse(c.req.param("identity"));
    return c.json({ data: c.get("service").vaults.getBeneficiaryVaults(beneficiary) });
  });

  routes.get("/tokens/:id", (c) => {
    const tokenId = IdParamSchema.parse(c.req.param("id"));
    return c.json({ data: c.get("service").vaults.getTokenDetails(tokenId) });
  });

  routes.get("/stats", (c) => {
    return c.json({ data: c.get("service").vaults.getContractStats() });
  });

  return routes;
}
