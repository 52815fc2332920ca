import type {
  IdempotencyRecord,
  IdempotencyStorePort,
} from "../../ports/idempotency-store.js";
import { SystemClock, type ClockPort } from "../../infra/clock.js";

interface InMemoryIdempotencyStoreOptions {
  ttlSeconds?: number;
  clock?: ClockPort;
}

export class InMemoryIdempotencyStore implements IdempotencyStorePort {
  private readonly scopes = new Map<string, Map<string, IdempotencyRecord<unknown>>>();
  private readonly keyLocks = new Map<string, { tail: Promise<void>; pending: number }>();
  private readonly ttlMs: number;
  private readonly clock: ClockPort;

  constructor(options: InMemoryIdempotencyStoreOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? 2_592_000) * 1000;
    this.clock = options.clock ?? new SystemClock();
  }

  async get<TBody>(scope: string, key: string): Promise<IdempotencyRecord<TBody> | null> {
    const scopeMap = this.scopes.get(scope);
    if (!scopeMap) {
      return null;
    }
    const entry = scopeMap.get(key);
    if (!entry) {
      return null;
    }
    if (this.hasExpired(entry.createdAt)) {
      this.evict(scope, key);
      return null;
    }
    return structuredClone(entry) as IdempotencyRecord<TBody>;
  }

  async put<TBody>(scope: string, key: string, record: IdempotencyRecord<TBody>): Promise<void> {
    const scopeMap = this.scopes.get(scope) ?? new Map<string, IdempotencyRecord<unknown>>();
    scopeMap.set(key, structuredClone(record));
    this.scopes.set(scope, scopeMap);
  }

  async delete(scope: string, key: string): Promise<void> {
    this.evict(scope, key);
  }

  async withKeyLock<TOutput>(
    scope: string,
    key: string,
    operation: () => Promise<TOutput>,
  ): Promise<TOutput> {
    const lockKey = `${scope}:${key}`;
    const lockState = this.keyLocks.get(lockKey) ?? { tail: Promise.resolve(), pending: 0 };
    this.keyLocks.set(lockKey, lockState);
    lockState.pending += 1;

    const acquire = lockState.tail;
    let releaseTail: () => void = () => {};
    const releaseSignal = new Promise<void>((resolve) => {
      releaseTail = resolve;
    });
    lockState.tail = lockState.tail.then(() => releaseSignal);

    await acquire;
    try {
      return await operation();
    } finally {
      releaseTail();
      lockState.pending -= 1;
      if (lockState.pending === 0) {
        this.keyLocks.delete(lockKey);
      }
    }
  }

  private evict(scope: string, key: string): void {
    const scopeMap = this.scopes.get(scope);
    if (!scopeMap) {
      return;
    }
    scopeMap.delete(key);
    if (scopeMap.size === 0) {
      this.scopes.delete(scope);
    }
  }

  private hasExpired(createdAt: string): boolean {
    const createdAtMs = Date.parse(createdAt);
    if (!Number.isFinite(createdAtMs)) {
      return true;
    }
    const nowMs = Date.parse(this.clock.nowIso());
    if (!Number.isFinite(nowMs)) {
      return false;
    }
    return nowMs - createdAtMs >= this.ttlMs;
  }
}
