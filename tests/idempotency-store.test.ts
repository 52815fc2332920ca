import { describe, expect, it } from "vitest";
import { InMemoryIdempotencyStore } from "../src/adapters/inmemory/idempotency-store.js";
import { MutableClock } from "./helpers.js";

describe("InMemoryIdempotencyStore", () => {
  it("keeps idempotency records within ttl window", async () => {
    const clock = new MutableClock("2026-02-08T10:00:00.000Z");
    const store = new InMemoryIdempotencyStore({ ttlSeconds: 60, clock });
    await store.put("create_payment_intent:tenant_a", "idem-1", {
      fingerprint: "fp_1",
      state: "completed",
      body: { id: "pi_1" },
      createdAt: "2026-02-08T09:59:30.000Z",
      completedAt: "2026-02-08T09:59:30.000Z",
    });

    const record = await store.get<{ id: string }>("create_payment_intent:tenant_a", "idem-1");
    expect(record?.state).toBe("completed");
    expect(record?.body?.id).toBe("pi_1");
  });

  it("expires and evicts idempotency records outside ttl window", async () => {
    const clock = new MutableClock("2026-02-08T10:00:00.000Z");
    const store = new InMemoryIdempotencyStore({ ttlSeconds: 60, clock });
    await store.put("create_payment_intent:tenant_a", "idem-2", {
      fingerprint: "fp_2",
      state: "completed",
      body: { id: "pi_2" },
      createdAt: "2026-02-08T09:58:59.000Z",
      completedAt: "2026-02-08T09:58:59.000Z",
    });

    expect(await store.get("create_payment_intent:tenant_a", "idem-2")).toBeNull();
    clock.setNow("2026-02-08T09:59:00.000Z");
    expect(await store.get("create_payment_intent:tenant_a", "idem-2")).toBeNull();
  });

  it("returns copies so callers cannot mutate stored bodies", async () => {
    const store = new InMemoryIdempotencyStore();
    const body = { id: "pi_3", status: "created" };
    await store.put("create_payment_intent:tenant_a", "idem-3", {
      fingerprint: "fp_3",
      state: "completed",
      body,
      createdAt: new Date().toISOString(),
      completedAt: new Date().toISOString(),
    });
    body.status = "succeeded";

    const record = await store.get<{ id: string; status: string }>("create_payment_intent:tenant_a", "idem-3");
    expect(record?.body?.status).toBe("created");
  });

  it("serializes concurrent operations for the same idempotency scope and key", async () => {
    const store = new InMemoryIdempotencyStore();
    const timeline: string[] = [];

    const first = store.withKeyLock("webhook:mpesa", "evt-lock", async () => {
      timeline.push("first:start");
      await new Promise<void>((resolve) => setTimeout(resolve, 25));
      timeline.push("first:end");
      return "first";
    });

    const second = store.withKeyLock("webhook:mpesa", "evt-lock", async () => {
      timeline.push("second:start");
      timeline.push("second:end");
      return "second";
    });

    const [firstResult, secondResult] = await Promise.all([first, second]);

    expect(firstResult).toBe("first");
    expect(secondResult).toBe("second");
    expect(timeline).toEqual(["first:start", "first:end", "second:start", "second:end"]);
  });

  it("does not serialize different keys", async () => {
    const store = new InMemoryIdempotencyStore();
    const timeline: string[] = [];
    let releaseFirst: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = store.withKeyLock("webhook:mpesa", "evt-a", async () => {
      timeline.push("a:start");
      await gate;
      timeline.push("a:end");
    });
    const second = store.withKeyLock("webhook:mpesa", "evt-b", async () => {
      timeline.push("b:run");
      releaseFirst();
    });

    await Promise.all([first, second]);
    expect(timeline).toEqual(["a:start", "b:run", "a:end"]);
  });
});
