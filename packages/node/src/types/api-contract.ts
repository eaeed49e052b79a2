/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { EscrowService } from "../services/escrow-service.js";

/**
 * Hono environment type for the Turnout app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The escrow service behind every /api route */
    service: EscrowService;

    /** Account acting on this request (set by caller middleware) */
    caller: string;
  };
}
