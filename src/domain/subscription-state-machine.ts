import type { SubscriptionStatus } from "./types.js";
import { AppError } from "../infra/app-error.js";

const ALLOWED_TRANSITIONS: Record<SubscriptionStatus, SubscriptionStatus[]> = {
  active: ["past_due", "cancelled"],
  past_due: ["active", "unpaid", "cancelled"],
  // unpaid is transient: it resolves to cancellation or the downgrade plan in the same sweep.
  unpaid: ["cancelled", "active"],
  cancelled: [],
};

export function canTransitionSubscription(current: SubscriptionStatus, next: SubscriptionStatus): boolean {
  return ALLOWED_TRANSITIONS[current].includes(next);
}

export function assertSubscriptionTransition(current: SubscriptionStatus, next: SubscriptionStatus): void {
  if (canTransitionSubscription(current, next)) {
    return;
  }
  throw new AppError(
    409,
    "invalid_subscription_transition",
    `Subscription transition from '${current}' to '${next}' is not allowed.`,
  );
}
