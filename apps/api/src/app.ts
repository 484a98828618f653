import Fastify from "fastify";
import type { FastifyError } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import type { Redis } from "ioredis";
import type { LimitSettings } from "@limitkit/schemas";
import {
  BackgroundExpiryNotifier,
  LimitManagerRegistry,
  StaticEntitlementProvider,
  StaticLimitConfigProvider,
  UnknownFeatureError,
  createLimitRegistry,
  createLogger,
} from "@limitkit/core";
import type { Clock, QuotaStore } from "@limitkit/core";
import { loadConfig, loadLimitSettings } from "./config.js";
import type { ApiConfig } from "./config.js";
import { createPromMetrics, metricsRoute } from "./metrics.js";
import { createQuotaStore } from "./quota-store/index.js";
import type { QuotaBackend } from "./quota-store/index.js";
import { featuresRoutes } from "./routes/features.js";
import { entitlementsRoutes } from "./routes/entitlements.js";
import { limitConfigRoutes } from "./routes/limit-config.js";
import { eventsRoutes } from "./routes/events.js";
import { healthRoutes } from "./routes/health.js";
import { sanitizeErrorMessage } from "./utils/error-sanitizer.js";

declare module "fastify" {
  interface FastifyInstance {
    limits: LimitManagerRegistry;
    notifier: BackgroundExpiryNotifier;
    limitConfig: StaticLimitConfigProvider;
    entitlements: StaticEntitlementProvider;
    quotaBackend: QuotaBackend;
    redis: Redis | null;
  }
}

export interface BuildServerOptions {
  config?: ApiConfig;
  /** Replaces the store picked from the environment. */
  store?: QuotaStore;
  clock?: Clock;
  limitSettings?: LimitSettings;
  entitlements?: StaticEntitlementProvider;
  logger?: boolean;
  /** Serve OpenAPI docs at /docs. Default: true */
  docs?: boolean;
  /** Collect process metrics alongside the limit metrics. Default: true */
  collectDefaultMetrics?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig();

  const app = Fastify({
    logger: options.logger ?? { level: config.LOG_LEVEL },
  });

  // Restrict origins when CORS_ORIGIN is set, allow all otherwise
  await app.register(cors, {
    origin: config.CORS_ORIGIN ? config.CORS_ORIGIN.split(",") : true,
  });

  await app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW_MS,
  });

  if (options.docs ?? true) {
    await app.register(swagger, {
      openapi: {
        info: {
          title: "limitkit API",
          description: "Per-feature usage quotas and cooldown windows",
          version: "0.1.0",
        },
        tags: [
          { name: "Features", description: "Check, perform and reset gated actions" },
          { name: "Entitlements", description: "Subscription and new-user status" },
          { name: "Config", description: "Limit settings" },
          { name: "Events", description: "Cooldown expiry notifications" },
          { name: "Health", description: "Service health" },
        ],
      },
    });
    await app.register(swaggerUi, {
      routePrefix: "/docs",
    });
  }

  // Global error handler: one error shape, sanitized messages
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    const statusCode = error instanceof UnknownFeatureError ? 404 : (error.statusCode ?? 500);

    if (statusCode >= 500) {
      app.log.error(error);
    }

    return reply.code(statusCode).send({
      error: sanitizeErrorMessage(error, statusCode),
      statusCode,
    });
  });

  const selection = options.store
    ? { store: options.store, backend: "memory" as const, redis: null }
    : createQuotaStore(config);
  const limitConfig = new StaticLimitConfigProvider(
    options.limitSettings ?? (await loadLimitSettings(config.LIMIT_SETTINGS_PATH)),
  );
  const entitlements = options.entitlements ?? new StaticEntitlementProvider();
  const prom = createPromMetrics({ collectDefaults: options.collectDefaultMetrics ?? true });

  const limits = createLimitRegistry({
    store: selection.store,
    config: limitConfig,
    entitlements,
    clock: options.clock,
    metrics: prom.metrics,
    logger: createLogger("limit-manager"),
  });
  const notifier = new BackgroundExpiryNotifier({
    registry: limits,
    intervalMs: config.NOTIFIER_INTERVAL_MS,
    logger: createLogger("expiry-notifier"),
  });

  app.decorate("limits", limits);
  app.decorate("notifier", notifier);
  app.decorate("limitConfig", limitConfig);
  app.decorate("entitlements", entitlements);
  app.decorate("quotaBackend", selection.backend);
  app.decorate("redis", selection.redis);

  // Expiry notifier lives as long as the server
  app.addHook("onReady", async () => {
    await notifier.start();
  });
  app.addHook("onClose", async () => {
    await notifier.close();
    if (selection.redis) {
      await selection.redis.quit();
    }
  });

  app.get("/health", async () => ({
    status: "ok",
    quotaBackend: selection.backend,
    timestamp: new Date().toISOString(),
  }));
  app.get("/metrics", metricsRoute(prom.register));

  await app.register(featuresRoutes, { prefix: "/api/features" });
  await app.register(entitlementsRoutes, { prefix: "/api/entitlements" });
  await app.register(limitConfigRoutes, { prefix: "/api/config" });
  await app.register(eventsRoutes, { prefix: "/api/events" });
  await app.register(healthRoutes, { prefix: "/api/health" });

  return app;
}
