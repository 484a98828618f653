/** Seconds of slack allowed when deciding whether a cooldown has run out. */
export const DEFAULT_EXPIRY_TOLERANCE_SECONDS = 1;

export interface Clock {
  /** Current time in epoch milliseconds. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current: number = Date.UTC(2026, 0, 1)) {}

  now(): number {
    return this.current;
  }

  set(epochMs: number): void {
    this.current = epochMs;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  advanceSeconds(seconds: number): void {
    this.current += seconds * 1000;
  }
}

export function toEpochSeconds(epochMs: number): number {
  return Math.floor(epochMs / 1000);
}

/**
 * Seconds left in a cooldown window that began at `startEpochSeconds`.
 * A start of 0 means no window is open.
 */
export function remainingCooldown(
  startEpochSeconds: number,
  durationSeconds: number,
  nowEpochSeconds: number,
): number {
  if (startEpochSeconds <= 0) return 0;
  return Math.max(0, durationSeconds - (nowEpochSeconds - startEpochSeconds));
}

export function hasCooldownExpired(
  startEpochSeconds: number,
  durationSeconds: number,
  nowEpochSeconds: number,
  toleranceSeconds: number = DEFAULT_EXPIRY_TOLERANCE_SECONDS,
): boolean {
  return remainingCooldown(startEpochSeconds, durationSeconds, nowEpochSeconds) <= toleranceSeconds;
}

/** Strict check with no tolerance: the window is open and has time left. */
export function isCooldownActive(
  startEpochSeconds: number,
  durationSeconds: number,
  nowEpochSeconds: number,
): boolean {
  return startEpochSeconds > 0 && nowEpochSeconds - startEpochSeconds < durationSeconds;
}
