/**
 * @turnout/node — HTTP surface for the escrow engine.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { EscrowService } from "./services/escrow-service.js";
export type { EscrowServiceConfig, ReadinessReport } from "./services/escrow-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
