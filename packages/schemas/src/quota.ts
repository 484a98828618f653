import { z } from "zod";
import { FeatureKeySchema } from "./feature.js";

/** Counters that survive a process restart. 0 means no cooldown is active. */
export const PersistedQuotaSchema = z.object({
  usageCount: z.number().int().nonnegative(),
  cooldownStartEpochSeconds: z.number().int().nonnegative(),
});
export type PersistedQuota = z.infer<typeof PersistedQuotaSchema>;

export const EMPTY_PERSISTED_QUOTA: PersistedQuota = {
  usageCount: 0,
  cooldownStartEpochSeconds: 0,
};

export const QuotaStateSchema = PersistedQuotaSchema.extend({
  featureKey: FeatureKeySchema,
  limit: z.number().int().positive(),
  cooldownDurationSeconds: z.number().nonnegative(),
});
export type QuotaState = z.infer<typeof QuotaStateSchema>;

export const FeatureLimitResultSchema = z.object({
  featureKey: FeatureKeySchema,
  canProceed: z.boolean(),
  showPopup: z.boolean(),
  remainingCooldownSeconds: z.number().nonnegative(),
  usageCount: z.number().int().nonnegative(),
  limit: z.number().int().positive(),
  remainingFreeActions: z.number().int().nonnegative(),
  isLimitReached: z.boolean(),
  bypassed: z.boolean(),
});
export type FeatureLimitResult = z.infer<typeof FeatureLimitResultSchema>;

export const PerformActionResultSchema = FeatureLimitResultSchema.extend({
  performed: z.boolean(),
});
export type PerformActionResult = z.infer<typeof PerformActionResultSchema>;

export const CooldownExpiredEventSchema = z.object({
  featureKey: FeatureKeySchema,
  expiredAtEpochSeconds: z.number().int().nonnegative(),
});
export type CooldownExpiredEvent = z.infer<typeof CooldownExpiredEventSchema>;
