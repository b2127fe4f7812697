import { describe, expect, it } from "vitest";
import { Budget } from "../ledger/budget";
import { monthLabel, summarizeMonth, summarizeYear } from "./monthly";

describe("monthly reports", () => {
  it("labels months", () => {
    expect(monthLabel(1)).toBe("January");
    expect(monthLabel(12)).toBe("December");
  });

  it("summarises a month against the goal limit", () => {
    const budget = Budget.create("b-1", "Household", "1000", { goalLimit: "300" });
    budget.addExpense(1, "Food", "120");

    const summary = summarizeMonth(budget, 1);

    expect(summary.label).toBe("January");
    expect(summary.incomeTotal.toString()).toBe("1000.00");
    expect(summary.expenseTotal.toString()).toBe("120.00");
    expect(summary.balance.toString()).toBe("880.00");
    expect(summary.remaining?.toString()).toBe("180.00");
    expect(summary.exceeded).toBe(false);
  });

  it("has no remaining amount without a goal limit", () => {
    const summary = summarizeMonth(Budget.create("b-1", "Household", "0"), 5);
    expect(summary.goalLimit).toBeNull();
    expect(summary.remaining).toBeNull();
  });

  it("summarises the year with the months over the limit", () => {
    const budget = Budget.create("b-1", "Household", "500", { goalLimit: "100", mode: "warn" });
    budget.addExpense(2, "Rent", "150");
    budget.addExpense(7, "Food", "60");

    const year = summarizeYear(budget);

    expect(year.months).toHaveLength(12);
    expect(year.totalIncome.toString()).toBe("500.00");
    expect(year.totalExpenses.toString()).toBe("210.00");
    expect(year.balance.toString()).toBe("290.00");
    expect(year.exceeded).toBe(true);
    expect(year.exceededMonths).toEqual([2]);
    expect(year.months[1].remaining?.toString()).toBe("-50.00");
    expect(year.months[1].exceeded).toBe(true);
  });
});
