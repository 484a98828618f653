import { readFile } from "node:fs/promises";
import { z } from "zod";
import { RemoteLimitSettingsSchema } from "@limitkit/schemas";
import type { LimitSettings } from "@limitkit/schemas";
import { DEFAULT_LIMIT_SETTINGS, limitSettingsFromRemote } from "@limitkit/core";

const blankAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  REDIS_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  QUOTA_STATE_PATH: z.preprocess(blankAsUndefined, z.string().optional()),
  QUOTA_NAMESPACE: z.string().min(1).default("default"),
  CORS_ORIGIN: z.preprocess(blankAsUndefined, z.string().optional()),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  NOTIFIER_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  LIMIT_SETTINGS_PATH: z.preprocess(blankAsUndefined, z.string().optional()),
});

export type ApiConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

/**
 * Reads remote-config style limit settings from a JSON file. Without a path the
 * built-in defaults apply.
 */
export async function loadLimitSettings(path: string | undefined): Promise<LimitSettings> {
  if (!path) return DEFAULT_LIMIT_SETTINGS;

  const raw: unknown = JSON.parse(await readFile(path, "utf8"));
  const parsed = RemoteLimitSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid limit settings in ${path}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return limitSettingsFromRemote(parsed.data);
}
