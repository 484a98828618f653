export {
  DEFAULT_FEATURE_LIMITS,
  DEFAULT_LIMIT_SETTINGS,
  DEFAULT_NEW_USER_FREE_PERIOD_SECONDS,
  FALLBACK_LIMIT,
  FALLBACK_COOLDOWN_SECONDS,
} from "./defaults.js";
export { resolveFeatureConfig, StaticLimitConfigProvider, limitSettingsFromRemote } from "./provider.js";
export type { LimitConfigProvider, ResolvedFeatureConfig } from "./provider.js";
export {
  StaticEntitlementProvider,
  isWithinNewUserPeriod,
  hasUnlimitedAccess,
} from "./entitlements.js";
export type { EntitlementProvider } from "./entitlements.js";
