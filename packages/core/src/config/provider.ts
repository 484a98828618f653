import { FEATURE_KEYS } from "@limitkit/schemas";
import type {
  FeatureKey,
  FeatureLimitConfig,
  LimitSettings,
  RemoteLimitSettings,
} from "@limitkit/schemas";
import { InvalidConfigurationError } from "../errors.js";
import {
  DEFAULT_FEATURE_LIMITS,
  DEFAULT_LIMIT_SETTINGS,
  FALLBACK_COOLDOWN_SECONDS,
  FALLBACK_LIMIT,
} from "./defaults.js";

/** Source of limit settings. Read on every operation, so changes apply on the next read. */
export interface LimitConfigProvider {
  getFeatureConfig(featureKey: FeatureKey): FeatureLimitConfig;
  getNewUserFreePeriodSeconds(): number;
}

export interface ResolvedFeatureConfig {
  config: FeatureLimitConfig;
  issues: InvalidConfigurationError[];
}

/**
 * Clamps a feature's settings into range: a limit must be a positive integer
 * and a cooldown a finite, non-negative number of seconds.
 */
export function resolveFeatureConfig(featureKey: FeatureKey, raw: FeatureLimitConfig): ResolvedFeatureConfig {
  const issues: InvalidConfigurationError[] = [];
  let { limit, cooldownDurationSeconds } = raw;

  if (!Number.isInteger(limit) || limit <= 0) {
    issues.push(new InvalidConfigurationError(featureKey, "limit", limit, FALLBACK_LIMIT));
    limit = FALLBACK_LIMIT;
  }
  if (!Number.isFinite(cooldownDurationSeconds) || cooldownDurationSeconds < 0) {
    issues.push(
      new InvalidConfigurationError(featureKey, "cooldownDurationSeconds", cooldownDurationSeconds, FALLBACK_COOLDOWN_SECONDS),
    );
    cooldownDurationSeconds = FALLBACK_COOLDOWN_SECONDS;
  }

  return { config: { limit, cooldownDurationSeconds, popupMode: raw.popupMode }, issues };
}

export class StaticLimitConfigProvider implements LimitConfigProvider {
  private settings: LimitSettings;

  constructor(settings: LimitSettings = DEFAULT_LIMIT_SETTINGS) {
    this.settings = cloneSettings(settings);
  }

  getFeatureConfig(featureKey: FeatureKey): FeatureLimitConfig {
    return { ...(this.settings.features[featureKey] ?? DEFAULT_FEATURE_LIMITS[featureKey]) };
  }

  getNewUserFreePeriodSeconds(): number {
    return this.settings.newUserFreePeriodSeconds;
  }

  getSettings(): LimitSettings {
    return cloneSettings(this.settings);
  }

  /** Merges per-feature overrides into the current settings. */
  update(patch: {
    features?: Partial<Record<FeatureKey, Partial<FeatureLimitConfig>>>;
    newUserFreePeriodSeconds?: number;
  }): void {
    const features = { ...this.settings.features };
    for (const key of FEATURE_KEYS) {
      const override = patch.features?.[key];
      if (!override) continue;
      features[key] = { ...this.getFeatureConfig(key), ...override };
    }
    this.settings = {
      features,
      newUserFreePeriodSeconds: patch.newUserFreePeriodSeconds ?? this.settings.newUserFreePeriodSeconds,
    };
  }

  replace(settings: LimitSettings): void {
    this.settings = cloneSettings(settings);
  }
}

function cloneSettings(settings: LimitSettings): LimitSettings {
  const features: LimitSettings["features"] = {};
  for (const key of FEATURE_KEYS) {
    const entry = settings.features[key];
    if (entry) features[key] = { ...entry };
  }
  return { features, newUserFreePeriodSeconds: settings.newUserFreePeriodSeconds };
}

const REMOTE_KEYS: Record<
  FeatureKey,
  { limit: keyof RemoteLimitSettings; cooldown: keyof RemoteLimitSettings }
> = {
  conversation: { limit: "freeConversationsLimit", cooldown: "freeConversationsCooldownSeconds" },
  refresh: { limit: "freeRefreshLimit", cooldown: "freeRefreshCooldownSeconds" },
  filter: { limit: "freeFilterLimit", cooldown: "freeFilterCooldownSeconds" },
  search: { limit: "freeSearchLimit", cooldown: "freeSearchCooldownSeconds" },
  message: { limit: "freeMessagesLimit", cooldown: "freeMessagesCooldownSeconds" },
};

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && value > 0 ? value : fallback;
}

/**
 * Maps the flat remote-config document onto per-feature settings.
 * Missing, zero or negative values keep the value from `base`.
 */
export function limitSettingsFromRemote(
  remote: RemoteLimitSettings,
  base: LimitSettings = DEFAULT_LIMIT_SETTINGS,
): LimitSettings {
  const features: LimitSettings["features"] = {};
  for (const key of FEATURE_KEYS) {
    const current = base.features[key] ?? DEFAULT_FEATURE_LIMITS[key];
    const names = REMOTE_KEYS[key];
    features[key] = {
      limit: positiveOr(remote[names.limit], current.limit),
      cooldownDurationSeconds: positiveOr(remote[names.cooldown], current.cooldownDurationSeconds),
      popupMode: current.popupMode,
    };
  }

  const freePeriod = remote.newUserFreePeriodSeconds;
  return {
    features,
    newUserFreePeriodSeconds:
      freePeriod !== undefined && freePeriod >= 0 ? freePeriod : base.newUserFreePeriodSeconds,
  };
}
