import { describe, expect, it } from "vitest";
import { InMemoryLedgerStore } from "../src/adapters/inmemory/ledger-store.js";
import { cashAccount, LedgerService, normalSide, type AppendTransactionInput } from "../src/application/ledger.js";
import { DuplicateReferenceError, UnbalancedTransactionError } from "../src/domain/errors.js";
import { silentLogger } from "../src/infra/logger.js";
import { MutableClock } from "./helpers.js";

function setup() {
  const clock = new MutableClock("2026-04-01T09:00:00.000Z");
  const store = new InMemoryLedgerStore();
  const ledger = new LedgerService(store, clock, silentLogger());
  return { clock, store, ledger };
}

function settlement(id: string, reference: string, amount: number): AppendTransactionInput {
  return {
    id,
    tenantId: "tenant_a",
    kind: "settlement",
    reference,
    entryReference: `pay_${reference}`,
    description: "renewal settlement",
    currency: "KES",
    lines: [
      { account: "cash:mpesa", direction: "debit", amount },
      { account: "revenue:subscriptions", direction: "credit", amount },
    ],
  };
}

describe("LedgerService", () => {
  it("classifies account normal sides", () => {
    expect(normalSide("cash:mpesa")).toBe("debit");
    expect(normalSide("receivable:subjects")).toBe("debit");
    expect(normalSide("revenue:sales")).toBe("credit");
    expect(normalSide("payable:tax")).toBe("credit");
    expect(cashAccount("airtel")).toBe("cash:airtel");
  });

  it("posts a balanced group and stamps the entry reference", async () => {
    const { ledger } = setup();
    const posting = await ledger.append(settlement("ltx_1", "pi_1", 50_000));

    expect(posting.group).toMatchObject({ id: "ltx_1", kind: "settlement", reference: "pi_1", tenant_id: "tenant_a" });
    expect(posting.entries).toHaveLength(2);
    expect(posting.entries.map((entry) => entry.reference)).toEqual(["pay_pi_1", "pay_pi_1"]);
    expect(posting.entries.map((entry) => entry.created_at)).toEqual([
      "2026-04-01T09:00:00.000Z",
      "2026-04-01T09:00:00.000Z",
    ]);
    expect(await ledger.hasTransaction("ltx_1")).toBe(true);
    expect(await ledger.hasTransaction("ltx_2")).toBe(false);
  });

  it("rejects unbalanced, single-line and fractional groups", async () => {
    const { ledger } = setup();
    const unbalanced = settlement("ltx_u", "pi_u", 100);
    unbalanced.lines = [
      { account: "cash:mpesa", direction: "debit", amount: 100 },
      { account: "revenue:sales", direction: "credit", amount: 90 },
    ];
    await expect(ledger.append(unbalanced)).rejects.toBeInstanceOf(UnbalancedTransactionError);

    const single = settlement("ltx_s", "pi_s", 100);
    single.lines = [{ account: "cash:mpesa", direction: "debit", amount: 100 }];
    await expect(ledger.append(single)).rejects.toBeInstanceOf(UnbalancedTransactionError);

    const fractional = settlement("ltx_f", "pi_f", 10.5);
    await expect(ledger.append(fractional)).rejects.toBeInstanceOf(UnbalancedTransactionError);

    expect(await ledger.hasTransaction("ltx_u")).toBe(false);
    expect(await ledger.verifyIntegrity()).toEqual([]);
  });

  it("refuses a second group with the same id or the same kind and reference", async () => {
    const { ledger } = setup();
    await ledger.append(settlement("ltx_1", "pi_1", 100));
    await expect(ledger.append(settlement("ltx_1", "pi_9", 100))).rejects.toBeInstanceOf(DuplicateReferenceError);
    await expect(ledger.append(settlement("ltx_2", "pi_1", 100))).rejects.toBeInstanceOf(DuplicateReferenceError);

    const reversal = { ...settlement("ltx_rev", "pi_1", 100), kind: "reversal" as const };
    reversal.lines = [
      { account: "revenue:subscriptions", direction: "debit", amount: 100 },
      { account: "cash:mpesa", direction: "credit", amount: 100 },
    ];
    await ledger.append(reversal);

    const entries = await ledger.listEntries({ tenantId: "tenant_a", limit: 10 });
    expect(entries.data).toHaveLength(4);
  });

  it("folds balances on the normal side up to the as-of instant", async () => {
    const { ledger, clock } = setup();
    await ledger.append(settlement("ltx_1", "pi_1", 10_000));
    clock.setNow("2026-04-02T09:00:00.000Z");
    await ledger.append(settlement("ltx_2", "pi_2", 2_500));

    expect(await ledger.balanceOf({ tenantId: "tenant_a", account: "cash:mpesa" })).toBe(12_500);
    expect(await ledger.balanceOf({ tenantId: "tenant_a", account: "revenue:subscriptions" })).toBe(12_500);
    expect(
      await ledger.balanceOf({ tenantId: "tenant_a", account: "cash:mpesa", asOf: "2026-04-01T23:59:59.999Z" }),
    ).toBe(10_000);
    expect(await ledger.balanceOf({ tenantId: "tenant_b", account: "cash:mpesa" })).toBe(0);
  });

  it("paginates entries by cursor and filters by account", async () => {
    const { ledger, clock } = setup();
    await ledger.append(settlement("ltx_1", "pi_1", 100));
    clock.advanceSeconds(60);
    await ledger.append(settlement("ltx_2", "pi_2", 200));

    const cash = await ledger.listEntries({ tenantId: "tenant_a", account: "cash:mpesa", limit: 1 });
    expect(cash.data.map((entry) => entry.amount)).toEqual([100]);
    expect(cash.hasMore).toBe(true);

    const next = await ledger.listEntries({
      tenantId: "tenant_a",
      account: "cash:mpesa",
      limit: 1,
      ...(cash.nextCursor ? { cursor: cash.nextCursor } : {}),
    });
    expect(next.data.map((entry) => entry.amount)).toEqual([200]);
    expect(next.hasMore).toBe(false);
  });
});
