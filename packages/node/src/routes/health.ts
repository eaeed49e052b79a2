/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check: notification hash chain intact and
 *               escrow books reconciled with custody
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { EscrowService } from "../services/escrow-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: EscrowService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const report = service.readiness();

    const notifications: SubsystemStatus = report.integrity.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: `chainValid=false, errors=${report.integrity.errors.length}`,
        };

    const custody: SubsystemStatus = report.reconciled
      ? { status: "ok" }
      : {
          status: "down",
          detail: `books=${report.totalEscrowed.toString()}, custody=${report.custodyEscrowed.toString()}`,
        };

    const ready = notifications.status === "ok" && custody.status === "ok";

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems: { notifications, custody },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
