/**
 * Health check routes.
 *
 * GET /health  - Liveness probe (always 200 if server is running)
 * GET /ready  - Readiness probe: notification-log integrity, and for every
 *               splitter custody agreeing with the pool and no refused
 *               notifications
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { SplitterRegistry } from "../services/splitter-registry.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(registry: SplitterRegistry): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const subsystems: Record<string, SubsystemStatus> = {};

    const integrity = registry.eventStore.verifyIntegrity();
    subsystems["eventLog"] = integrity.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: `lastVerifiedPosition=${String(integrity.lastVerifiedPosition)}, errors=${String(integrity.errors.length)}`,
        };

    for (const service of registry.all()) {
      const health = service.health();
      const problems: string[] = [];
      if (!health.custodyMatchesPool) {
        problems.push("custody balance differs from pool balance");
      }
      if (health.unpublishedBatches > 0) {
        problems.push(`unpublished notification batches: ${String(health.unpublishedBatches)}`);
      }
      subsystems[`splitter:${health.id}`] =
        problems.length === 0 ? { status: "ok" } : { status: "down", detail: problems.join("; ") };
    }

    const ready = Object.values(subsystems).every((s) => s.status === "ok");

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        splitters: registry.ids().length,
        subsystems,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
