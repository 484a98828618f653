import type { FeatureKey, FeatureLimitConfig, LimitSettings } from "@limitkit/schemas";

export const DEFAULT_FEATURE_LIMITS: Record<FeatureKey, FeatureLimitConfig> = {
  conversation: { limit: 2, cooldownDurationSeconds: 30, popupMode: "whenLimited" },
  refresh: { limit: 2, cooldownDurationSeconds: 120, popupMode: "always" },
  filter: { limit: 2, cooldownDurationSeconds: 120, popupMode: "always" },
  search: { limit: 15, cooldownDurationSeconds: 120, popupMode: "whenLimited" },
  message: { limit: 5, cooldownDurationSeconds: 300, popupMode: "whenLimited" },
};

/** New accounts get no unlimited period unless configured. */
export const DEFAULT_NEW_USER_FREE_PERIOD_SECONDS = 0;

export const DEFAULT_LIMIT_SETTINGS: LimitSettings = {
  features: DEFAULT_FEATURE_LIMITS,
  newUserFreePeriodSeconds: DEFAULT_NEW_USER_FREE_PERIOD_SECONDS,
};

export const FALLBACK_LIMIT = 1;
export const FALLBACK_COOLDOWN_SECONDS = 0;
