import { beforeEach, describe, expect, it } from "vitest";
import type { Money } from "../ledger/money";
import { captureError } from "../testing/capture";
import type { TransactionKind } from "../types";
import { TransactionStore } from "./store";
import { TransactionBuilder, type Transaction } from "./transaction";

let sequence = 0;

function entry(kind: TransactionKind, category: string, amount: string, id?: string): Transaction {
  sequence += 1;
  return new TransactionBuilder({ generateId: () => id ?? `txn-${sequence}` })
    .kind(kind)
    .category(category)
    .amount(amount)
    .occurredOn("2024-02-10")
    .build();
}

function asStrings(totals: Record<string, Money>): Record<string, string> {
  return Object.fromEntries(Object.entries(totals).map(([category, total]) => [category, total.toString()]));
}

describe("TransactionStore", () => {
  let store: TransactionStore;

  beforeEach(() => {
    store = new TransactionStore();
    store.record("alice", entry("expense", "Food", "30"));
    store.record("alice", entry("expense", "Food", "45"));
    store.record("alice", entry("income", "Salary", "1000"));
  });

  it("totals expenses by category", () => {
    expect(asStrings(store.totalsByCategory("alice"))).toEqual({ Food: "75.00" });
  });

  it("leaves out categories that sum to zero", () => {
    store.record("alice", entry("expense", "Gifts", "0"));
    expect(Object.keys(store.totalsByCategory("alice"))).toEqual(["Food"]);
  });

  it("totals by kind and summarises", () => {
    expect(store.totalsByKind("alice", "expense").toString()).toBe("75.00");
    expect(store.totalsByKind("bob", "income").toString()).toBe("0.00");
    const summary = store.summary("alice");
    expect(summary.totalIncome.toString()).toBe("1000.00");
    expect(summary.totalExpenses.toString()).toBe("75.00");
    expect(summary.netBalance.toString()).toBe("925.00");
  });

  it("finds expenses whose amount is over a ceiling", () => {
    const found = store.exceeding("alice", "40");
    expect(found.map((transaction) => transaction.amount.toString())).toEqual(["45.00"]);
    expect(store.exceeding("alice", "45")).toEqual([]);
    expect(captureError(() => store.exceeding("alice", "-1"))).toMatchObject({ code: "INVALID_AMOUNT" });
  });

  it("counts a category regardless of case", () => {
    expect(store.countByCategory("alice", "food")).toBe(2);
    expect(store.countByCategory("alice", "SALARY")).toBe(1);
    expect(store.countByCategory("bob", "Food")).toBe(0);
  });

  it("ignores a transaction whose id is already recorded", () => {
    const duplicate = entry("expense", "Food", "5", "dup");
    expect(store.record("bob", duplicate)).toBe(true);
    expect(store.record("bob", duplicate)).toBe(false);
    expect(store.list("bob")).toHaveLength(1);
  });

  it("keeps each user's transactions apart and in order", () => {
    store.record("bob", entry("expense", "Fuel", "20"));
    expect(store.users()).toEqual(["alice", "bob"]);
    expect(store.list("alice").map((transaction) => transaction.category)).toEqual(["Food", "Food", "Salary"]);
    expect(store.list("carol")).toEqual([]);
  });

  it("refuses an empty user id", () => {
    expect(captureError(() => store.list(""))).toMatchObject({ code: "INVALID_FIELD" });
  });

  it("replaces and clears a user's transactions", () => {
    const replacement = entry("income", "Gift", "10");
    store.replace("alice", [replacement]);
    expect(store.list("alice")).toEqual([replacement]);
    expect(captureError(() => store.replace("alice", [replacement, replacement]))).toMatchObject({
      code: "INVALID_FIELD",
    });
    expect(store.clear("alice")).toBe(1);
    expect(store.list("alice")).toEqual([]);
    expect(store.clear("alice")).toBe(0);
  });

  it("rebuilds an equal store from its snapshot", () => {
    const restored = TransactionStore.fromSnapshot(store.toSnapshot());
    expect(restored.list("alice")).toEqual(store.list("alice"));
    expect(restored.toSnapshot()).toEqual(store.toSnapshot());
  });
});
