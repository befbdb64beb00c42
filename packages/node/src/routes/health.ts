/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check (supply invariant + event log integrity)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LedgerService } from "../services/ledger-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: LedgerService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { invariants, integrity, ready } = service.checkHealth();

    const subsystems: Record<string, SubsystemStatus> = {
      ledger: invariants.holds
        ? { status: "ok" }
        : {
            status: "down",
            detail: `totalSupply=${invariants.totalSupply}, sumOfBalances=${invariants.sumOfBalances}`,
          },
      eventStore: integrity.valid
        ? { status: "ok" }
        : {
            status: "down",
            detail: `chainValid=false, errors=${integrity.errors.length}`,
          },
    };

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        holders: invariants.holderCount,
        events: integrity.lastVerifiedPosition,
        subsystems,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
