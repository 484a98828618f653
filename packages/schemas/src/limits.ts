import { z } from "zod";
import { FeatureKeySchema, PopupModeSchema } from "./feature.js";

/**
 * Limit settings as supplied by the configuration collaborator.
 * Numbers are not range-checked here; limit managers clamp them on read.
 */
export const FeatureLimitConfigSchema = z.object({
  limit: z.number(),
  cooldownDurationSeconds: z.number(),
  popupMode: PopupModeSchema,
});
export type FeatureLimitConfig = z.infer<typeof FeatureLimitConfigSchema>;

export const LimitSettingsSchema = z.object({
  features: z.record(FeatureKeySchema, FeatureLimitConfigSchema),
  newUserFreePeriodSeconds: z.number().nonnegative(),
});
export type LimitSettings = z.infer<typeof LimitSettingsSchema>;

const optionalCount = z.number().int().optional();
const optionalSeconds = z.number().optional();

/** Flat key/value document published by remote config. Unknown keys are ignored. */
export const RemoteLimitSettingsSchema = z.object({
  newUserFreePeriodSeconds: optionalSeconds,
  freeConversationsLimit: optionalCount,
  freeConversationsCooldownSeconds: optionalSeconds,
  freeRefreshLimit: optionalCount,
  freeRefreshCooldownSeconds: optionalSeconds,
  freeFilterLimit: optionalCount,
  freeFilterCooldownSeconds: optionalSeconds,
  freeSearchLimit: optionalCount,
  freeSearchCooldownSeconds: optionalSeconds,
  freeMessagesLimit: optionalCount,
  freeMessagesCooldownSeconds: optionalSeconds,
});
export type RemoteLimitSettings = z.infer<typeof RemoteLimitSettingsSchema>;

export const EntitlementsSchema = z.object({
  subscriber: z.boolean(),
  accountCreatedAtEpochSeconds: z.number().int().nonnegative().nullable(),
});
export type Entitlements = z.infer<typeof EntitlementsSchema>;
