/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Kept apart from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { join } from "node:path";
import { Hono } from "hono";
import {
  createSplitterCatalog,
  InMemoryEventStore,
  JsonlEventStore,
} from "@sharepool/event-store";
import type { EventStore, StoredEvent } from "@sharepool/event-store";
import type { PublishFailure } from "@sharepool/splitter";
import type { AppEnv } from "./types/api-contract.js";
import { SplitterRegistry } from "./services/splitter-registry.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createSplitterRoutes } from "./routes/splitters.js";

export const EVENT_LOG_FILE = "events.jsonl";
export const STATE_FILE = "splitters.json";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly defaultCurrency: string;
  readonly defaultDecimals: number;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Auth configuration. Without it, callers identify via X-Caller-Id. */
  readonly auth?: AuthConfig | undefined;
  /**
   * Directory for the JSONL notification log and the state file.
   * Everything stays in memory when unset.
   */
  readonly dataDir?: string | undefined;
  readonly newId?: () => string;
  /** Called for every notification the log accepts */
  readonly onEvent?: (event: StoredEvent) => void;
  /** Called for every notification batch the log refuses */
  readonly onPublishError?: (failure: PublishFailure) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly registry: SplitterRegistry;
  readonly eventStore: EventStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const catalog = createSplitterCatalog();
  const eventStore: EventStore =
    options.dataDir !== undefined
      ? new JsonlEventStore({ filePath: join(options.dataDir, EVENT_LOG_FILE), catalog })
      : new InMemoryEventStore({ catalog });
  if (options.onEvent !== undefined) {
    eventStore.subscribeAll(options.onEvent);
  }

  const registry = new SplitterRegistry({
    defaultCurrency: options.defaultCurrency,
    defaultDecimals: options.defaultDecimals,
    eventStore,
    stateFile: options.dataDir !== undefined ? join(options.dataDir, STATE_FILE) : undefined,
    newId: options.newId,
    onPublishError: options.onPublishError,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(registry));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", authMiddleware(options.auth));

  // Commands can change state even when they fail part-way.
  if (registry.persistent) {
    app.use("/api/*", async (c, next) => {
      await next();
      if (c.req.method === "POST") {
        registry.save();
      }
    });
  }

  app.route("/api/v1/splitters", createSplitterRoutes(registry));

  return { app, registry, eventStore };
}
