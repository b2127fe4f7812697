import { describe, expect, it } from "vitest";
import { captureError } from "../testing/capture";
import { Budget, validateMonth } from "./budget";

describe("Budget", () => {
  it("seeds initial funding into January", () => {
    const budget = Budget.create("b-1", "Household", "1000");
    expect(budget.monthlyIncome(1).toString()).toBe("1000.00");
    expect(budget.monthlyIncome(2).toString()).toBe("0.00");
    expect(budget.balance().toString()).toBe("1000.00");
    expect(budget.goalLimit).toBeNull();
  });

  it("validates the fields it is created with", () => {
    expect(captureError(() => Budget.create("", "Household", "1"))).toMatchObject({
      code: "INVALID_FIELD",
      message: "Budget id cannot be empty.",
    });
    expect(captureError(() => Budget.create("b-1", "  ", "1"))).toMatchObject({ code: "INVALID_FIELD" });
    expect(captureError(() => Budget.create("b-1", "Household", "-5"))).toMatchObject({
      code: "INVALID_AMOUNT",
    });
  });

  it("refuses months outside 1 to 12", () => {
    const budget = Budget.create("b-1", "Household", "0");
    for (const month of [0, 13, 1.5]) {
      expect(captureError(() => budget.addIncome(month, "Salary", "1"))).toMatchObject({
        code: "INVALID_MONTH",
      });
      expect(captureError(() => budget.addExpense(month, "Food", "1"))).toMatchObject({
        code: "INVALID_MONTH",
      });
      expect(captureError(() => budget.monthlyExpenses(month))).toMatchObject({ code: "INVALID_MONTH" });
    }
    expect(validateMonth(12)).toBe(12);
  });

  it("checks the month before the category", () => {
    const budget = Budget.create("b-1", "Household", "0");
    expect(captureError(() => budget.addExpense(13, "", "1"))).toMatchObject({ code: "INVALID_MONTH" });
    expect(captureError(() => budget.addExpense(1, "", "1"))).toMatchObject({ code: "INVALID_FIELD" });
  });

  it("rejects an expense that takes the month over the goal limit", () => {
    const budget = Budget.create("b-1", "Household", "1000", { goalLimit: "300" });
    budget.addExpense(1, "Food", "200");
    const before = budget.toSnapshot();

    expect(captureError(() => budget.addExpense(1, "Food", "150"))).toMatchObject({
      code: "BUDGET_EXCEEDED",
      message: "Adding this expense exceeds your budget for the month.",
    });
    expect(budget.monthlyExpenses(1).toString()).toBe("200.00");
    expect(budget.toSnapshot()).toEqual(before);
    expect(budget.exceeded).toBe(false);
  });

  it("records and flags the expense in warn mode", () => {
    const budget = Budget.create("b-1", "Household", "1000", { goalLimit: "300", mode: "warn" });
    const outcome = budget.addExpense(2, "Rent", "350");
    expect(outcome.month).toBe(2);
    expect(outcome.expenseTotal.toString()).toBe("350.00");
    expect(outcome.exceeded).toBe(true);
    expect(budget.exceeded).toBe(true);
    expect(budget.exceededMonths()).toEqual([2]);
  });

  it("does not enforce a zero goal limit", () => {
    const budget = Budget.create("b-1", "Household", "0", { goalLimit: "0" });
    const outcome = budget.addExpense(1, "Car", "5000");
    expect(outcome.exceeded).toBe(false);
    expect(budget.exceeded).toBe(false);
    expect(budget.goalLimit?.toString()).toBe("0.00");
  });

  it("totals income and expenses across the year", () => {
    const budget = Budget.create("b-1", "Household", "1000");
    budget.addIncome(3, "Bonus", "200");
    budget.addExpense(2, "Food", "50");
    budget.addExpense(12, "Gifts", "25.50");

    expect(budget.totalIncome().toString()).toBe("1200.00");
    expect(budget.totalExpenses().toString()).toBe("75.50");
    expect(budget.balance().toString()).toBe("1124.50");
    expect(budget.monthlyBalance(2).toString()).toBe("-50.00");
  });

  it("resets expenses and installs a new goal limit", () => {
    const budget = Budget.create("b-1", "Household", "1000", { goalLimit: "100", mode: "warn" });
    budget.addExpense(1, "Food", "150");
    budget.addIncome(6, "Salary", "400");

    budget.reset("500");

    expect(budget.totalExpenses().toString()).toBe("0.00");
    expect(budget.totalIncome().toString()).toBe("1400.00");
    expect(budget.goalLimit?.toString()).toBe("500.00");
    expect(budget.exceeded).toBe(false);
  });

  it("refuses a reset to a non-positive goal and keeps its state", () => {
    const budget = Budget.create("b-1", "Household", "1000", { goalLimit: "300" });
    budget.addExpense(1, "Food", "100");

    expect(captureError(() => budget.reset("0"))).toMatchObject({
      code: "INVALID_AMOUNT",
      message: "New goal limit must be greater than zero.",
    });
    expect(budget.monthlyExpenses(1).toString()).toBe("100.00");
    expect(budget.goalLimit?.toString()).toBe("300.00");
  });

  it("rebuilds an equal budget from its snapshot", () => {
    const budget = Budget.create("b-1", "Household", "1000", { goalLimit: "300" });
    budget.addExpense(4, "Food", "120.75");
    budget.addIncome(9, "Salary", "88");

    const restored = Budget.fromSnapshot(budget.toSnapshot());

    expect(restored).toEqual(budget);
    expect(restored.toSnapshot().months[3]).toEqual({ month: 4, incomeTotal: "0.00", expenseTotal: "120.75" });
  });

  it("refuses a snapshot with a missing month", () => {
    const snapshot = Budget.create("b-1", "Household", "0").toSnapshot();
    const error = captureError(() =>
      Budget.fromSnapshot({ ...snapshot, months: snapshot.months.filter((entry) => entry.month !== 7) }),
    );
    expect(error).toMatchObject({ code: "INVALID_MONTH", message: "Snapshot is missing month 7." });
  });
});
