import { z } from "zod";

export const FeatureKeySchema = z.enum(["conversation", "refresh", "filter", "search", "message"]);
export type FeatureKey = z.infer<typeof FeatureKeySchema>;

export const FEATURE_KEYS: readonly FeatureKey[] = FeatureKeySchema.options;

export const FEATURE_DISPLAY_NAMES: Record<FeatureKey, string> = {
  conversation: "Start Conversation",
  refresh: "Refresh",
  filter: "Apply Filter",
  search: "Search",
  message: "Send Message",
};

/**
 * When the gating popup should be shown to a user without unlimited access.
 * "always" shows progress on every attempt; "whenLimited" only once the quota is used up.
 */
export const PopupModeSchema = z.enum(["always", "whenLimited"]);
export type PopupMode = z.infer<typeof PopupModeSchema>;

export function isFeatureKey(value: unknown): value is FeatureKey {
  return FeatureKeySchema.safeParse(value).success;
}
