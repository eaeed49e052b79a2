/**
 * Notification feed.
 *
 * GET /api/v1/notifications?afterPosition=&limit=  — Every event's notifications, in global order
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { FeedQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createNotificationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = FeedQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"), 400);
    }

    const query = queryResult.data;
    const notifications = service.feed({
      fromPosition: (query.afterPosition ?? 0) + 1,
      maxCount: query.limit,
    });

    const last = notifications.at(-1);
    return c.json({
      data: notifications,
      next: notifications.length === query.limit && last !== undefined ? last.globalPosition : null,
    });
  });

  return routes;
}
