/**
 * Metrics abstraction shaped after prom-client. The API wires real Prometheus
 * collectors through setMetrics(); everything else falls back to in-memory counters.
 */

export interface LimitMetrics {
  actionsAllowed: Counter;
  actionsBlocked: Counter;
  cooldownsStarted: Counter;
  cooldownsExpired: Counter;
  persistenceFailures: Counter;
  cooldownWaitSeconds: Histogram;
}

export interface Counter {
  inc(labels?: Record<string, string>, value?: number): void;
}

export interface Histogram {
  observe(labels: Record<string, string>, value: number): void;
}

export class InMemoryCounter implements Counter {
  private value = 0;
  inc(_labels?: Record<string, string>, amount = 1): void {
    this.value += amount;
  }
  get(): number {
    return this.value;
  }
}

export class InMemoryHistogram implements Histogram {
  private values: number[] = [];
  observe(_labels: Record<string, string>, value: number): void {
    this.values.push(value);
  }
  getValues(): number[] {
    return [...this.values];
  }
}

export interface InMemoryLimitMetrics extends LimitMetrics {
  actionsAllowed: InMemoryCounter;
  actionsBlocked: InMemoryCounter;
  cooldownsStarted: InMemoryCounter;
  cooldownsExpired: InMemoryCounter;
  persistenceFailures: InMemoryCounter;
  cooldownWaitSeconds: InMemoryHistogram;
}

let activeMetrics: LimitMetrics | null = null;

export function setMetrics(metrics: LimitMetrics): void {
  activeMetrics = metrics;
}

export function getMetrics(): LimitMetrics {
  if (!activeMetrics) {
    activeMetrics = createInMemoryMetrics();
  }
  return activeMetrics;
}

export function createInMemoryMetrics(): InMemoryLimitMetrics {
  return {
    actionsAllowed: new InMemoryCounter(),
    actionsBlocked: new InMemoryCounter(),
    cooldownsStarted: new InMemoryCounter(),
    cooldownsExpired: new InMemoryCounter(),
    persistenceFailures: new InMemoryCounter(),
    cooldownWaitSeconds: new InMemoryHistogram(),
  };
}
