// Clock
export {
  DEFAULT_EXPIRY_TOLERANCE_SECONDS,
  systemClock,
  ManualClock,
  toEpochSeconds,
  remainingCooldown,
  hasCooldownExpired,
  isCooldownActive,
} from "./clock/index.js";
export type { Clock } from "./clock/index.js";

// Quota storage
export { InMemoryQuotaStore, FileQuotaStore } from "./quota-store/index.js";
export type { QuotaStore } from "./quota-store/index.js";

// Configuration & entitlements
export {
  DEFAULT_FEATURE_LIMITS,
  DEFAULT_LIMIT_SETTINGS,
  DEFAULT_NEW_USER_FREE_PERIOD_SECONDS,
  FALLBACK_LIMIT,
  FALLBACK_COOLDOWN_SECONDS,
  resolveFeatureConfig,
  StaticLimitConfigProvider,
  limitSettingsFromRemote,
  StaticEntitlementProvider,
  isWithinNewUserPeriod,
  hasUnlimitedAccess,
} from "./config/index.js";
export type { LimitConfigProvider, ResolvedFeatureConfig, EntitlementProvider } from "./config/index.js";

// Limit managers
export { LimitManager, LimitManagerRegistry, createLimitRegistry } from "./limit-manager/index.js";
export type {
  LimitManagerOptions,
  LimitRegistryOptions,
  CooldownStartedEvent,
  CooldownStartedListener,
} from "./limit-manager/index.js";

// Expiry notifier
export { BackgroundExpiryNotifier } from "./notifier/index.js";
export type {
  NotifierState,
  CooldownExpiredListener,
  ExpiryNotifierOptions,
  WaitForExpiryOptions,
} from "./notifier/index.js";

// Errors
export {
  PersistenceReadError,
  PersistenceWriteError,
  InvalidConfigurationError,
  UnknownFeatureError,
} from "./errors.js";

// Telemetry
export {
  getMetrics,
  setMetrics,
  createInMemoryMetrics,
  InMemoryCounter,
  InMemoryHistogram,
} from "./telemetry/index.js";
export type { LimitMetrics, InMemoryLimitMetrics, Counter, Histogram } from "./telemetry/index.js";

// Utilities
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { withRetry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
export { KeyedMutex } from "./utils/keyed-mutex.js";
