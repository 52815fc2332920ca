import type { PaymentIntentStatus } from "./types.js";
import { AppError } from "../infra/app-error.js";

const ALLOWED_TRANSITIONS: Record<PaymentIntentStatus, PaymentIntentStatus[]> = {
  created: ["provider_initiated", "failed", "cancelled"],
  provider_initiated: ["succeeded", "failed", "expired"],
  // Reversal is the only exit from a terminal status.
  succeeded: ["reversed"],
  failed: [],
  expired: [],
  cancelled: [],
  reversed: [],
};

const TERMINAL_STATUSES: Set<PaymentIntentStatus> = new Set([
  "succeeded",
  "failed",
  "expired",
  "cancelled",
  "reversed",
]);

export function canTransition(current: PaymentIntentStatus, next: PaymentIntentStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS[current];
  return allowed.includes(next);
}

export function isTerminalStatus(status: PaymentIntentStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function assertTransition(current: PaymentIntentStatus, next: PaymentIntentStatus): void {
  if (canTransition(current, next)) {
    return;
  }
  throw new AppError(
    409,
    "invalid_state_transition",
    `Transition from '${current}' to '${next}' is not allowed.`,
  );
}
