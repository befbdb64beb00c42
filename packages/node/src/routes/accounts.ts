/**
 * Host-side account administration.
 *
 * GET  /api/v1/accounts/:account                    — Balance and oracle values
 * PUT  /api/v1/accounts/:account/reference-balance  — Set reference balance (admin)
 * POST /api/v1/accounts/:account/activity           — Record activity (admin)
 *
 * These feed the activity and solvency gates; they never touch balances.
 */

import { Hono } from "hono";
import { parseBaseUnits } from "@tollgate/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { RecordActivitySchema, ReferenceBalanceSchema } from "../types/dto.js";
import type { AccountView } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import type { LedgerService } from "../services/ledger-service.js";
import { amountView } from "./views.js";

function accountView(service: LedgerService, account: string): AccountView {
  return {
    account,
    balance: amountView(service.balanceOf(account), service.info().descriptor.decimals),
    activityCounter: service.activityOf(account).toString(),
    referenceBalance: service.referenceBalanceOf(account).toString(),
  };
}

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:account", requirePermission("read"), (c) => {
    return c.json(accountView(c.get("service"), c.req.param("account")));
  });

  routes.put(
    "/:account/reference-balance",
    requirePermission("admin"),
    validateBody(ReferenceBalanceSchema),
    (c) => {
      const service = c.get("service");
      const account = c.req.param("account");
      service.setReferenceBalance(account, parseBaseUnits(c.req.valid("json").amount));
      return c.json(accountView(service, account));
    },
  );

  routes.post(
    "/:account/activity",
    requirePermission("admin"),
    validateBody(RecordActivitySchema),
    (c) => {
      const service = c.get("service");
      const account = c.req.param("account");
      service.recordActivity(account, BigInt(c.req.valid("json").count));
      return c.json(accountView(service, account));
    },
  );

  return routes;
}
