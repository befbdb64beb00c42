/**
 * Asset read routes.
 *
 * GET /api/v1/asset              — Descriptor, administrator, total supply
 * GET /api/v1/supply             — Total supply
 * GET /api/v1/holders            — Account balances (cursor pagination)
 * GET /api/v1/balances/:account  — Balance of one account
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListHoldersQuerySchema } from "../types/dto.js";
import type { BalanceView } from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { requirePermission } from "../middleware/auth.js";
import { validateQuery } from "../middleware/validate.js";
import { amountView, assetView } from "./views.js";

export function createAssetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  const read = requirePermission("read");

  routes.get("/asset", read, (c) => {
    return c.json(assetView(c.get("service").info()));
  });

  routes.get("/supply", read, (c) => {
    const service = c.get("service");
    const { decimals } = service.info().descriptor;
    return c.json(amountView(service.totalSupply(), decimals));
  });

  routes.get("/holders", read, validateQuery(ListHoldersQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.req.valid("query");
    const { decimals } = service.info().descriptor;

    // Position is creation order, 1-based
    const holders = service.holders().map((h, i) => ({ position: i + 1, holding: h }));
    const page = paginate(holders, query, (h) => h.position, "holder");

    const data: BalanceView[] = page.data.map(({ holding }) => ({
      account: holding.owner,
      ...amountView(holding.balance, decimals),
    }));
    return c.json({ data, pagination: page.pagination });
  });

  routes.get("/balances/:account", read, (c) => {
    const service = c.get("service");
    const account = c.req.param("account");
    const { decimals } = service.info().descriptor;

    const view: BalanceView = { account, ...amountView(service.balanceOf(account), decimals) };
    return c.json(view);
  });

  return routes;
}
