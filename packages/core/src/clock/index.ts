export {
  DEFAULT_EXPIRY_TOLERANCE_SECONDS,
  systemClock,
  ManualClock,
  toEpochSeconds,
  remainingCooldown,
  hasCooldownExpired,
  isCooldownActive,
} from "./cooldown-clock.js";
export type { Clock } from "./cooldown-clock.js";
