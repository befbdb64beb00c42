/**
 * Ledger operation routes.
 *
 * POST /api/v1/mint      — Administrator mints to an account
 * POST /api/v1/burn      — Administrator burns from an account
 * POST /api/v1/transfer  — Caller transfers to an account
 *
 * The caller is the authenticated account. Whether it may mint or burn
 * is decided by the ledger, not by the role.
 */

import { Hono } from "hono";
import { parseBaseUnits } from "@tollgate/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { BurnSchema, MintSchema, TransferSchema } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { ledgerEventView } from "./views.js";

export function createOperationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  const write = requirePermission("write");

  routes.post("/mint", write, validateBody(MintSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");
    const event = service.mint(
      c.get("auth").accountId,
      body.to,
      parseBaseUnits(body.amount),
      c.get("requestId"),
    );
    return c.json(ledgerEventView(event, service.info().descriptor.decimals), 201);
  });

  routes.post("/burn", write, validateBody(BurnSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");
    const event = service.burn(
      c.get("auth").accountId,
      body.from,
      parseBaseUnits(body.amount),
      c.get("requestId"),
    );
    return c.json(ledgerEventView(event, service.info().descriptor.decimals), 201);
  });

  routes.post("/transfer", write, validateBody(TransferSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");
    const event = service.transfer(
      c.get("auth").accountId,
      body.to,
      parseBaseUnits(body.amount),
      c.get("requestId"),
    );
    return c.json(ledgerEventView(event, service.info().descriptor.decimals), 201);
  });

  return routes;
}
