import type { FastifyPluginAsync } from "fastify";
import { sanitizeHealthError } from "../utils/error-sanitizer.js";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  // GET /api/health/deep - Quota backend and expiry notifier health
  app.get("/deep", {
    schema: {
      description: "Deep health check: quota store backend and expiry notifier.",
      tags: ["Health"],
    },
  }, async (_request, reply) => {
    const checks: Record<string, { status: string; latencyMs: number; error?: string; detail?: unknown }> = {};
    let allHealthy = true;

    // Quota store: ping the shared Redis connection when there is one
    const storeStart = Date.now();
    try {
      if (app.redis) {
        await app.redis.ping();
        checks["quotaStore"] = { status: "connected", latencyMs: Date.now() - storeStart, detail: { backend: "redis" } };
      } else {
        checks["quotaStore"] = { status: "local", latencyMs: 0, detail: { backend: app.quotaBackend } };
      }
    } catch (err) {
      checks["quotaStore"] = {
        status: "disconnected",
        latencyMs: Date.now() - storeStart,
        error: sanitizeHealthError(err),
        detail: { backend: app.quotaBackend },
      };
      allHealthy = false;
    }

    checks["notifier"] = {
      status: app.notifier.getState(),
      latencyMs: 0,
      detail: { watching: app.notifier.watchedFeatures() },
    };

    return reply.code(allHealthy ? 200 : 503).send({
      healthy: allHealthy,
      checks,
      checkedAt: new Date().toISOString(),
    });
  });
};
