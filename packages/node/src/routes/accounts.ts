/**
 * Value ledger account routes.
 *
 * GET  /api/v1/accounts/:identity         — External balance and transactions
 * POST /api/v1/accounts/:identity/credit  — Issue value (admin only)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreditAccountSchema, IdentitySchema } from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:identity", (c) => {
    const service = c.get("service");
    const identity = IdentitySchema.parse(c.req.param("identity"));
    return c.json({
      data: {
        ...service.balanceOf(identity),
        transactions: service.accountTransactions(identity),
      },
    });
  });

  routes.post("/:identity/credit", requirePermission("admin"), async (c) => {
    const service = c.get("service");
    const identity = IdentitySchema.parse(c.req.param("identity"));
    const body = await parseBody(c, CreditAccountSchema);
    return c.json({ data: service.credit(identity, body.amount) }, 201);
  });

  return routes;
}
