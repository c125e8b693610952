/**
 * @sharepool/node: package public API.
 */

export { SplitterService } from "./services/splitter-service.js";
export type {
  SplitterServiceConfig,
  SplitterServiceState,
  SplitterView,
  PayeeView,
  SplitterHealth,
} from "./services/splitter-service.js";
export { SplitterRegistry } from "./services/splitter-registry.js";
export type {
  SplitterRegistryConfig,
  CreateSplitterRequest,
} from "./services/splitter-registry.js";
export { readStateFile, writeStateFile, StateFileSchema } from "./services/state-file.js";
export type { StateFile } from "./services/state-file.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp, EVENT_LOG_FILE, STATE_FILE } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
