/**
 * Event and settlement routes.
 *
 * POST /api/v1/events                               — Register an event
 * GET  /api/v1/events                               — List events
 * GET  /api/v1/events/:id/metadata                  — Name and owner (never 404)
 * GET  /api/v1/events/:id                           — Get a single event
 * POST /api/v1/events/:id/reservations              — Stake for a slot
 * GET  /api/v1/events/:id/reservations/:participant — Reservation status
 * POST /api/v1/events/:id/check-in                  — Check in, reclaim stake
 * POST /api/v1/events/:id/withdraw                  — Owner sweeps no-show stakes
 * GET  /api/v1/events/:id/notifications             — Notification history
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AccountParamSchema,
  CreateEventSchema,
  EventIdParamSchema,
  ReserveSchema,
  toEventView,
  toReservationResponse,
  toWithdrawResponse,
} from "../types/dto.js";
import { parseBody, parseParam } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/events — Register
  routes.post("/", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, CreateEventSchema);

    const eventId = service.createEvent(c.get("caller"), body);
    return c.json({ data: { eventId } }, 201);
  });

  // GET /api/v1/events — List
  routes.get("/", (c) => {
    const service = c.get("service");
    const events = service.listEvents().map((event) => toEventView(event, service.getEscrow(event.id)));
    return c.json({ data: events });
  });

  // GET /api/v1/events/:id/metadata
  routes.get("/:id/metadata", (c) => {
    const service = c.get("service");
    const id = parseParam(c, "id", EventIdParamSchema);
    return c.json({ data: service.getEventMetadata(id) });
  });

  // GET /api/v1/events/:id — Get one
  routes.get("/:id", (c) => {
    const service = c.get("service");
    const id = parseParam(c, "id", EventIdParamSchema);
    const event = service.getEvent(id);

    if (event === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Event ${id} not found`), 404);
    }

    return c.json({ data: toEventView(event, service.getEscrow(id)) });
  });

  // POST /api/v1/events/:id/reservations — Reserve as the caller
  routes.post("/:id/reservations", async (c) => {
    const service = c.get("service");
    const id = parseParam(c, "id", EventIdParamSchema);
    const body = await parseBody(c, ReserveSchema);

    const reservation = service.reserve(id, c.get("caller"), body.amount);
    return c.json({ data: toReservationResponse(reservation) }, 201);
  });

  // GET /api/v1/events/:id/reservations/:participant
  routes.get("/:id/reservations/:participant", (c) => {
    const service = c.get("service");
    const id = parseParam(c, "id", EventIdParamSchema);
    const participant = parseParam(c, "participant", AccountParamSchema);
    return c.json({ data: toReservationResponse(service.getReservation(id, participant)) });
  });

  // POST /api/v1/events/:id/check-in — Check in as the caller
  routes.post("/:id/check-in", (c) => {
    const service = c.get("service");
    const id = parseParam(c, "id", EventIdParamSchema);

    const reservation = service.checkIn(id, c.get("caller"));
    return c.json({ data: toReservationResponse(reservation) });
  });

  // POST /api/v1/events/:id/withdraw — Sweep as the owner
  routes.post("/:id/withdraw", (c) => {
    const service = c.get("service");
    const id = parseParam(c, "id", EventIdParamSchema);

    const result = service.withdraw(id, c.get("caller"));
    return c.json({ data: toWithdrawResponse(result) });
  });

  // GET /api/v1/events/:id/notifications
  routes.get("/:id/notifications", (c) => {
    const service = c.get("service");
    const id = parseParam(c, "id", EventIdParamSchema);
    return c.json({ data: service.notifications(id) });
  });

  return routes;
}
