/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createEventRoutes } from "./events.js";
export { createWalletRoutes } from "./wallets.js";
export { createNotificationRoutes } from "./notifications.js";
