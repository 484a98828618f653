export {
  getMetrics,
  setMetrics,
  createInMemoryMetrics,
  InMemoryCounter,
  InMemoryHistogram,
} from "./metrics.js";
export type { LimitMetrics, InMemoryLimitMetrics, Counter, Histogram } from "./metrics.js";
