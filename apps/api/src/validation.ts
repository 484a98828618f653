import { z } from "zod";
import { EntitlementsSchema, FeatureKeySchema, RemoteLimitSettingsSchema } from "@limitkit/schemas";

// ── Entitlements ─────────────────────────────────────────────────────

export const UpdateEntitlementsBodySchema = EntitlementsSchema.partial();

// ── Limit configuration ──────────────────────────────────────────────

export const UpdateLimitConfigBodySchema = RemoteLimitSettingsSchema;

// ── Events ───────────────────────────────────────────────────────────

export const CooldownExpiredQuerySchema = z.object({
  timeoutMs: z.coerce.number().int().min(0).max(60_000).default(25_000),
  featureKey: FeatureKeySchema.optional(),
});
