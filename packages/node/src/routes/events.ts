/**
 * Event query routes.
 *
 * GET /api/v1/events — Committed ledger events (cursor pagination)
 *
 * Query: afterSequence, kind, cursor, limit
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { requirePermission } from "../middleware/auth.js";
import { validateQuery } from "../middleware/validate.js";
import { eventView } from "./views.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), validateQuery(ListEventsQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.req.valid("query");

    const events = service
      .events(query.afterSequence ?? 0)
      .filter((r) => query.kind === undefined || r.event.kind === query.kind);

    const page = paginate(events, query, (r) => r.event.sequence, "sequence");
    const { decimals } = service.info().descriptor;

    return c.json({
      data: page.data.map((r) => eventView(r, decimals)),
      pagination: page.pagination,
    });
  });

  return routes;
}
