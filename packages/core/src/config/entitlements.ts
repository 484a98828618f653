import type { Entitlements } from "@limitkit/schemas";

/** Who the current user is, as far as gating cares. */
export interface EntitlementProvider {
  isSubscriber(): boolean;
  /** Epoch seconds, or null when unknown. */
  accountCreatedAtEpochSeconds(): number | null;
}

export class StaticEntitlementProvider implements EntitlementProvider {
  private current: Entitlements;

  constructor(initial: Partial<Entitlements> = {}) {
    this.current = {
      subscriber: initial.subscriber ?? false,
      accountCreatedAtEpochSeconds: initial.accountCreatedAtEpochSeconds ?? null,
    };
  }

  isSubscriber(): boolean {
    return this.current.subscriber;
  }

  accountCreatedAtEpochSeconds(): number | null {
    return this.current.accountCreatedAtEpochSeconds;
  }

  get(): Entitlements {
    return { ...this.current };
  }

  set(patch: Partial<Entitlements>): Entitlements {
    this.current = { ...this.current, ...patch };
    return this.get();
  }
}

export function isWithinNewUserPeriod(
  accountCreatedAtEpochSeconds: number | null,
  freePeriodSeconds: number,
  nowEpochSeconds: number,
): boolean {
  if (accountCreatedAtEpochSeconds === null || accountCreatedAtEpochSeconds <= 0) return false;
  if (freePeriodSeconds <= 0) return false;
  return nowEpochSeconds - accountCreatedAtEpochSeconds < freePeriodSeconds;
}

/** Subscribers and accounts still inside the new-user free period skip gating entirely. */
export function hasUnlimitedAccess(
  entitlements: EntitlementProvider,
  freePeriodSeconds: number,
  nowEpochSeconds: number,
): boolean {
  return (
    entitlements.isSubscriber() ||
    isWithinNewUserPeriod(entitlements.accountCreatedAtEpochSeconds(), freePeriodSeconds, nowEpochSeconds)
  );
}
