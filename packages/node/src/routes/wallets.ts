/**
 * Wallet routes.
 *
 * POST /api/v1/wallets/deposit   — Credit the caller's wallet
 * GET  /api/v1/wallets/:account          — Wallet balance
 * GET  /api/v1/wallets/:account/entries  — Journal lines of the wallet
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AccountParamSchema, DepositSchema, toStatementLine } from "../types/dto.js";
import { parseBody, parseParam } from "../middleware/validate.js";

export function createWalletRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposit", async (c) => {
    const service = c.get("service");
    const account = c.get("caller");
    const body = await parseBody(c, DepositSchema);

    const balance = service.deposit(account, body.amount);
    return c.json({ data: { account, balance: balance.toString() } });
  });

  routes.get("/:account", (c) => {
    const service = c.get("service");
    const account = parseParam(c, "account", AccountParamSchema);
    return c.json({ data: { account, balance: service.balanceOf(account).toString() } });
  });

  routes.get("/:account/entries", (c) => {
    const service = c.get("service");
    const account = parseParam(c, "account", AccountParamSchema);
    return c.json({ data: service.statement(account).map(toStatementLine) });
  });

  return routes;
}
