import { Redis } from "ioredis";
import { FileQuotaStore, InMemoryQuotaStore } from "@limitkit/core";
import type { QuotaStore } from "@limitkit/core";
import type { ApiConfig } from "../config.js";
import { RedisQuotaStore } from "./redis.js";

export type QuotaBackend = "redis" | "file" | "memory";

export interface QuotaStoreSelection {
  store: QuotaStore;
  backend: QuotaBackend;
  /** Connection owned by the selection, to be closed with the server. */
  redis: Redis | null;
}

/** Redis when REDIS_URL is set, else a JSON file at QUOTA_STATE_PATH, else memory. */
export function createQuotaStore(
  config: Pick<ApiConfig, "REDIS_URL" | "QUOTA_STATE_PATH" | "QUOTA_NAMESPACE">,
): QuotaStoreSelection {
  if (config.REDIS_URL) {
    const redis = new Redis(config.REDIS_URL, { maxRetriesPerRequest: 2 });
    return { store: new RedisQuotaStore(redis, config.QUOTA_NAMESPACE), backend: "redis", redis };
  }
  if (config.QUOTA_STATE_PATH) {
    return { store: new FileQuotaStore(config.QUOTA_STATE_PATH), backend: "file", redis: null };
  }
  return { store: new InMemoryQuotaStore(), backend: "memory", redis: null };
}

export { RedisQuotaStore, quotaKey } from "./redis.js";
export type { RedisQuotaClient } from "./redis.js";
