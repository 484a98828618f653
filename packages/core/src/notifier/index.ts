export { BackgroundExpiryNotifier } from "./expiry-notifier.js";
export type {
  NotifierState,
  CooldownExpiredListener,
  ExpiryNotifierOptions,
  WaitForExpiryOptions,
} from "./expiry-notifier.js";
