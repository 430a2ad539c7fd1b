/**
 * @roundfeed/node — HTTP service for one roundfeed aggregator.
 */

export { FeedService } from "./services/feed-service.js";
export type { FeedServiceConfig, FeedServiceDeps } from "./services/feed-service.js";
export { loadConfig, parseApiKeys, parseOracles, parseAddressList, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey, ApiKeyRole, ApiKeyKind } from "./config.js";
export { createApp, CALLER_ADDRESS_HEADER } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
