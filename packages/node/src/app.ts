/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { EscrowService } from "./services/escrow-service.js";
import type { EscrowServiceConfig } from "./services/escrow-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { callerMiddleware } from "./middleware/caller.js";
import { createHealthRoutes } from "./routes/health.js";
import { createEventRoutes } from "./routes/events.js";
import { createWalletRoutes } from "./routes/wallets.js";
import { createNotificationRoutes } from "./routes/notifications.js";
import { createErrorEnvelope } from "./types/error.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Existing service to serve. Built from `serviceConfig` when omitted. */
  readonly service?: EscrowService;
  readonly serviceConfig?: EscrowServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: EscrowService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service = options.service ?? new EscrowService(options.serviceConfig);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no caller required) ─────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", callerMiddleware());
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1/wallets", createWalletRoutes());
  app.route("/api/v1/notifications", createNotificationRoutes());

  return { app, service };
}
