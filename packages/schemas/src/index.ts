export * from "./feature.js";
export * from "./quota.js";
export * from "./limits.js";
