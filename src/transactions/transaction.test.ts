import { describe, expect, it } from "vitest";
import { captureError } from "../testing/capture";
import {
  TransactionBuilder,
  fromTransactionRecord,
  monthOf,
  toTransactionRecord,
} from "./transaction";

const fixedClock = () => new Date("2024-05-17T10:00:00Z");

describe("TransactionBuilder", () => {
  it("builds a frozen transaction with trimmed text", () => {
    const transaction = new TransactionBuilder({ generateId: () => "txn-1", clock: fixedClock })
      .kind("expense")
      .category("  Food ")
      .amount("12.5")
      .description(" Lunch ")
      .occurredOn("2024-03-09")
      .build();

    expect(toTransactionRecord(transaction)).toEqual({
      id: "txn-1",
      amount: "12.50",
      kind: "expense",
      category: "Food",
      description: "Lunch",
      occurredOn: "2024-03-09",
    });
    expect(Object.isFrozen(transaction)).toBe(true);
    expect(monthOf(transaction)).toBe(3);
  });

  it("dates a transaction from the clock when no date is given", () => {
    const transaction = new TransactionBuilder({ clock: fixedClock })
      .kind("income")
      .category("Salary")
      .amount(100)
      .build();
    expect(transaction.occurredOn).toBe("2024-05-17");
    expect(transaction.description).toBe("");
  });

  it("gives every built transaction its own id", () => {
    const build = () => new TransactionBuilder().kind("income").category("Salary").amount("1").build();
    expect(build().id).not.toBe(build().id);
  });

  it("fails at the setter that receives a bad value", () => {
    const builder = new TransactionBuilder();
    expect(captureError(() => builder.amount("-4"))).toMatchObject({ code: "INVALID_AMOUNT" });
    expect(captureError(() => builder.category("   "))).toMatchObject({
      code: "INVALID_FIELD",
      message: "Category cannot be empty.",
    });
    expect(captureError(() => builder.kind("transfer"))).toMatchObject({ code: "INVALID_FIELD" });
    expect(captureError(() => builder.occurredOn("2024-13-01"))).toMatchObject({ code: "INVALID_FIELD" });
    expect(captureError(() => builder.occurredOn("yesterday"))).toMatchObject({ code: "INVALID_FIELD" });
  });

  it("refuses to build without the required fields", () => {
    expect(captureError(() => new TransactionBuilder().amount("1").kind("income").build())).toMatchObject({
      code: "INVALID_FIELD",
      details: { field: "category" },
    });
    expect(captureError(() => new TransactionBuilder().category("Food").kind("expense").build())).toMatchObject({
      code: "INVALID_FIELD",
      details: { field: "amount" },
    });
    expect(captureError(() => new TransactionBuilder().category("Food").amount("1").build())).toMatchObject({
      code: "INVALID_FIELD",
      details: { field: "kind" },
    });
  });

  it("restores a stored record with its id", () => {
    const record = {
      id: "txn-9",
      amount: "40.00",
      kind: "expense" as const,
      category: "Fuel",
      description: "",
      occurredOn: "2024-11-30",
    };
    const transaction = fromTransactionRecord(record);
    expect(transaction.id).toBe("txn-9");
    expect(transaction.amount.toString()).toBe("40.00");
    expect(toTransactionRecord(transaction)).toEqual(record);
  });
});
