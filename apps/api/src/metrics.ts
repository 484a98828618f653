import {
  Counter as PromCounterCollector,
  Histogram as PromHistogramCollector,
  Registry,
  collectDefaultMetrics,
} from "prom-client";
import type { FastifyReply, FastifyRequest } from "fastify";
import type { Counter, Histogram, LimitMetrics } from "@limitkit/core";

class PromCounter implements Counter {
  private counter: PromCounterCollector<string>;
  constructor(register: Registry, name: string, help: string, labelNames: string[]) {
    this.counter = new PromCounterCollector({ name, help, labelNames, registers: [register] });
  }
  inc(labels?: Record<string, string>, value?: number): void {
    if (labels) {
      this.counter.inc(labels, value ?? 1);
    } else {
      this.counter.inc(value ?? 1);
    }
  }
}

class PromHistogram implements Histogram {
  private histogram: PromHistogramCollector<string>;
  constructor(register: Registry, name: string, help: string, labelNames: string[], buckets?: number[]) {
    this.histogram = new PromHistogramCollector({ name, help, labelNames, buckets, registers: [register] });
  }
  observe(labels: Record<string, string>, value: number): void {
    this.histogram.observe(labels, value);
  }
}

const FEATURE_LABELS = ["feature"];
const COOLDOWN_BUCKETS = [5, 15, 30, 60, 120, 300, 600, 1800, 3600];

export interface PromMetrics {
  metrics: LimitMetrics;
  register: Registry;
}

export function createPromMetrics(options: { collectDefaults?: boolean } = {}): PromMetrics {
  const register = new Registry();
  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register });
  }

  return {
    register,
    metrics: {
      actionsAllowed: new PromCounter(register, "limitkit_actions_allowed_total", "Gated actions allowed", FEATURE_LABELS),
      actionsBlocked: new PromCounter(register, "limitkit_actions_blocked_total", "Gated actions blocked by cooldown", FEATURE_LABELS),
      cooldownsStarted: new PromCounter(register, "limitkit_cooldowns_started_total", "Cooldown windows started", [
        "feature",
        "trigger",
      ]),
      cooldownsExpired: new PromCounter(register, "limitkit_cooldowns_expired_total", "Cooldown windows expired", FEATURE_LABELS),
      persistenceFailures: new PromCounter(register, "limitkit_persistence_failures_total", "Quota store failures", [
        "feature",
        "operation",
      ]),
      cooldownWaitSeconds: new PromHistogram(
        register,
        "limitkit_cooldown_wait_seconds",
        "Length of started cooldown windows in seconds",
        FEATURE_LABELS,
        COOLDOWN_BUCKETS,
      ),
    },
  };
}

export function metricsRoute(register: Registry) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    const metrics = await register.metrics();
    return reply.type(register.contentType).send(metrics);
  };
}
