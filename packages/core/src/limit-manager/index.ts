export { LimitManager } from "./limit-manager.js";
export type {
  LimitManagerOptions,
  CooldownStartedEvent,
  CooldownStartedListener,
  CooldownExpiredListener,
} from "./limit-manager.js";
export { LimitManagerRegistry, createLimitRegistry } from "./registry.js";
export type { LimitRegistryOptions } from "./registry.js";
