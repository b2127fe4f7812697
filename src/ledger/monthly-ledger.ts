import type { EnforcementMode, MonthFigures } from "../types";
import { LedgerError } from "./errors";
import { Money, parseNonNegative } from "./money";

export interface LedgerExpenseResult {
  expenseTotal: Money;
  exceeded: boolean;
}

/** Running income and expense totals for one month of a budget. */
export class MonthlyLedger {
  private income: Money;
  private expenses: Money;

  constructor(
    readonly month: number,
    incomeTotal: Money = Money.zero(),
    expenseTotal: Money = Money.zero(),
  ) {
    this.income = parseNonNegative(incomeTotal, "Income total");
    this.expenses = parseNonNegative(expenseTotal, "Expense total");
  }

  get incomeTotal(): Money {
    return this.income;
  }

  get expenseTotal(): Money {
    return this.expenses;
  }

  addIncome(amount: Money): Money {
    this.income = this.income.add(parseNonNegative(amount, "Income amount"));
    return this.income;
  }

  /**
   * Adds an expense against an optional ceiling. In `reject` mode an expense that
   * would take the total over the ceiling throws and leaves the totals untouched.
   */
  addExpense(amount: Money, ceiling?: Money, mode: EnforcementMode = "reject"): LedgerExpenseResult {
    const accepted = parseNonNegative(amount, "Expense amount");
    const newTotal = this.expenses.add(accepted);
    const exceeded = ceiling !== undefined && newTotal.greaterThan(ceiling);
    if (mode === "reject" && ceiling !== undefined && newTotal.greaterThan(ceiling)) {
      throw new LedgerError("BUDGET_EXCEEDED", "Adding this expense exceeds your budget for the month.", {
        month: this.month,
        ceiling: ceiling.toString(),
        expenseTotal: this.expenses.toString(),
        attempted: accepted.toString(),
      });
    }
    this.expenses = newTotal;
    return { expenseTotal: newTotal, exceeded };
  }

  balance(): Money {
    return this.income.subtract(this.expenses);
  }

  /** Only a whole-budget reset may call this. */
  clearExpenses(): void {
    this.expenses = Money.zero();
  }

  figures(): MonthFigures {
    return {
      month: this.month,
      incomeTotal: this.income,
      expenseTotal: this.expenses,
    };
  }
}
