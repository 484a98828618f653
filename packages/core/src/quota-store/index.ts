export type { QuotaStore } from "./store.js";
export { InMemoryQuotaStore } from "./in-memory.js";
export { FileQuotaStore } from "./file.js";
