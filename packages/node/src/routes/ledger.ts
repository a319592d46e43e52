/**
 * Token ledger routes.
 *
 * POST /api/v1/ledger/mint                      — Issue supply (admin)
 * GET  /api/v1/ledger/balances/:account/:token  — Holder balance
 * GET  /api/v1/ledger/trial-balance             — Per-token debits/credits
 */

import { Hono } from "hono";
import type { AccountBalance } from "../services/cadence-service.js";
import type { AppEnv } from "../types/api-contract.js";
import { MintSchema } from "../types/dto.js";
import { dataEnvelope } from "../types/envelope.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export interface BalanceDto {
  readonly account: string;
  readonly token: string;
  readonly balance: string;
}

function toBalanceDto(b: AccountBalance): BalanceDto {
  return { account: b.account, token: b.token, balance: b.balance.toString() };
}

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/mint", requirePermission("admin"), validateBody(MintSchema), (c) => {
    const body = c.get("validatedBody");
    const balance = c
      .get("service")
      .mint(c.get("auth").account, body.account, body.token, body.amount);
    return c.json(dataEnvelope(toBalanceDto(balance)), 201);
  });

  routes.get("/balances/:account/:token", (c) => {
    const balance = c
      .get("service")
      .getBalance(c.req.param("account"), c.req.param("token"));
    return c.json(dataEnvelope(toBalanceDto(balance)));
  });

  routes.get("/trial-balance", (c) => {
    const trial = c.get("service").ledger.getTrialBalance();
    return c.json(
      dataEnvelope({
        balanced: trial.balanced,
        lines: trial.lines.map((line) => ({
          account: line.accountId,
          kind: line.kind,
          token: line.token,
          debitBalance: line.debitBalance.toString(),
          creditBalance: line.creditBalance.toString(),
        })),
      }),
    );
  });

  return routes;
}
