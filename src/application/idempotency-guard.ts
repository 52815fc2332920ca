import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { IdempotencyRecord, IdempotencyStorePort } from "../ports/idempotency-store.js";

export type Reservation<TBody> =
  | { kind: "acquired" }
  | { kind: "in_flight"; record: IdempotencyRecord<TBody> }
  | { kind: "completed"; record: IdempotencyRecord<TBody>; body: TBody };

export interface IdempotentResult<TBody> {
  body: TBody;
  replayed: boolean;
}

export interface IdempotencyGuardOptions {
  /** In-flight reservations older than this are treated as abandoned. */
  leaseSeconds: number;
}

export interface ExecuteOptions<TBody> {
  /** Returning false drops the reservation instead of recording the body, so a later delivery runs again. */
  shouldRecord?: (body: TBody) => boolean;
}

export class IdempotencyGuard {
  constructor(
    private readonly store: IdempotencyStorePort,
    private readonly clock: ClockPort,
    private readonly options: IdempotencyGuardOptions,
  ) {}

  async reserve<TBody>(scope: string, key: string, fingerprint: string): Promise<Reservation<TBody>> {
    return this.store.withKeyLock(scope, key, () => this.reserveLocked<TBody>(scope, key, fingerprint));
  }

  async complete<TBody>(scope: string, key: string, fingerprint: string, body: TBody): Promise<void> {
    const timestamp = this.clock.nowIso();
    await this.store.put<TBody>(scope, key, {
      fingerprint,
      state: "completed",
      body,
      createdAt: timestamp,
      completedAt: timestamp,
    });
  }

  /** Serializes work on (scope, key) without recording anything. */
  async withLock<TOutput>(scope: string, key: string, operation: () => Promise<TOutput>): Promise<TOutput> {
    return this.store.withKeyLock(scope, key, operation);
  }

  async release(scope: string, key: string): Promise<void> {
    await this.store.delete(scope, key);
  }

  /**
   * Runs `operation` at most once per (scope, key). Concurrent callers queue on
   * the key lock and receive the winner's recorded body.
   */
  async execute<TBody>(
    scope: string,
    key: string,
    fingerprint: string,
    operation: () => Promise<TBody>,
    options: ExecuteOptions<TBody> = {},
  ): Promise<IdempotentResult<TBody>> {
    return this.store.withKeyLock(scope, key, async () => {
      const reservation = await this.reserveLocked<TBody>(scope, key, fingerprint);
      if (reservation.kind === "completed") {
        return { body: reservation.body, replayed: true };
      }
      if (reservation.kind === "in_flight") {
        throw new AppError(
          409,
          "idempotency_in_flight",
          `Operation '${scope}' for key '${key}' is already in progress.`,
        );
      }

      let body: TBody;
      try {
        body = await operation();
      } catch (error) {
        await this.release(scope, key);
        throw error;
      }

      if (options.shouldRecord && !options.shouldRecord(body)) {
        await this.release(scope, key);
      } else {
        await this.complete(scope, key, fingerprint, body);
      }
      return { body, replayed: false };
    });
  }

  private async reserveLocked<TBody>(
    scope: string,
    key: string,
    fingerprint: string,
  ): Promise<Reservation<TBody>> {
    const existing = await this.store.get<TBody>(scope, key);
    if (existing) {
      if (existing.fingerprint !== fingerprint) {
        throw new AppError(
          409,
          "idempotency_conflict",
          "Idempotency key was already used with a different payload.",
        );
      }
      if (existing.state === "completed" && existing.body !== null) {
        return { kind: "completed", record: existing, body: existing.body };
      }
      if (existing.state === "in_flight" && !this.isLeaseExpired(existing.createdAt)) {
        return { kind: "in_flight", record: existing };
      }
    }

    await this.store.put<TBody>(scope, key, {
      fingerprint,
      state: "in_flight",
      body: null,
      createdAt: this.clock.nowIso(),
      completedAt: null,
    });
    return { kind: "acquired" };
  }

  private isLeaseExpired(createdAt: string): boolean {
    const createdAtMs = Date.parse(createdAt);
    const nowMs = Date.parse(this.clock.nowIso());
    if (!Number.isFinite(createdAtMs) || !Number.isFinite(nowMs)) {
      return true;
    }
    return nowMs - createdAtMs >= this.options.leaseSeconds * 1000;
  }
}
