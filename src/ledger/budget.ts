import type {
  BalanceBearing,
  BudgetSnapshot,
  EnforcementMode,
  ExpenseOutcome,
  MonthFigures,
} from "../types";
import { LedgerError } from "./errors";
import { Money, parseNonNegative, sumMoney, type MoneyInput } from "./money";
import { MonthlyLedger } from "./monthly-ledger";

export const MONTHS_PER_YEAR = 12;
export const INITIAL_FUNDING_CATEGORY = "Initial Funding";

export interface BudgetOptions {
  goalLimit?: MoneyInput | null;
  mode?: EnforcementMode;
}

export function validateMonth(month: number): number {
  if (!Number.isInteger(month) || month < 1 || month > MONTHS_PER_YEAR) {
    throw new LedgerError("INVALID_MONTH", "Month must be between 1 and 12.", { month });
  }
  return month;
}

function requireText(value: string, field: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new LedgerError("INVALID_FIELD", `${field} cannot be empty.`, { field });
  }
  return value;
}

function resolveGoalLimit(goalLimit: MoneyInput | null | undefined): Money | null {
  if (goalLimit === undefined || goalLimit === null) {
    return null;
  }
  return parseNonNegative(goalLimit, "Goal limit");
}

/**
 * A year of twelve monthly ledgers under one optional per-month expense ceiling.
 *
 * The goal limit is enforced only when it is set and greater than zero. Whether an
 * expense over the limit is refused or merely flagged depends on the budget's mode.
 */
export class Budget implements BalanceBearing {
  private goal: Money | null;
  private readonly ledgers: MonthlyLedger[];

  private constructor(
    readonly id: string,
    readonly name: string,
    goalLimit: Money | null,
    readonly mode: EnforcementMode,
    ledgers: MonthlyLedger[],
  ) {
    this.goal = goalLimit;
    this.ledgers = ledgers;
  }

  static create(id: string, name: string, initialFunding: MoneyInput, options: BudgetOptions = {}): Budget {
    requireText(id, "Budget id");
    requireText(name, "Budget name");
    const funding = parseNonNegative(initialFunding, "Initial funding");
    const ledgers = Array.from({ length: MONTHS_PER_YEAR }, (_, index) => new MonthlyLedger(index + 1));
    const budget = new Budget(id, name, resolveGoalLimit(options.goalLimit), options.mode ?? "reject", ledgers);
    budget.addIncome(1, INITIAL_FUNDING_CATEGORY, funding);
    return budget;
  }

  static fromSnapshot(snapshot: BudgetSnapshot, options: Pick<BudgetOptions, "mode"> = {}): Budget {
    requireText(snapshot.id, "Budget id");
    requireText(snapshot.name, "Budget name");
    const byMonth = new Map(snapshot.months.map((entry) => [entry.month, entry]));
    const ledgers = Array.from({ length: MONTHS_PER_YEAR }, (_, index) => {
      const month = index + 1;
      const entry = byMonth.get(month);
      if (!entry) {
        throw new LedgerError("INVALID_MONTH", `Snapshot is missing month ${month}.`, { month });
      }
      return new MonthlyLedger(month, Money.parse(entry.incomeTotal), Money.parse(entry.expenseTotal));
    });
    return new Budget(
      snapshot.id,
      snapshot.name,
      resolveGoalLimit(snapshot.goalLimit),
      options.mode ?? "reject",
      ledgers,
    );
  }

  get goalLimit(): Money | null {
    return this.goal;
  }

  /** True whenever any month's expenses are over the goal limit. */
  get exceeded(): boolean {
    return this.exceededMonths().length > 0;
  }

  addIncome(month: number, category: string, amount: MoneyInput): Money {
    const ledger = this.ledgerFor(month);
    requireText(category, "Income category");
    return ledger.addIncome(parseNonNegative(amount, "Income amount"));
  }

  addExpense(month: number, category: string, amount: MoneyInput): ExpenseOutcome {
    const ledger = this.ledgerFor(month);
    requireText(category, "Expense category");
    const result = ledger.addExpense(parseNonNegative(amount, "Expense amount"), this.ceiling(), this.mode);
    return { month, ...result };
  }

  monthlyIncome(month: number): Money {
    return this.ledgerFor(month).incomeTotal;
  }

  monthlyExpenses(month: number): Money {
    return this.ledgerFor(month).expenseTotal;
  }

  monthlyBalance(month: number): Money {
    return this.ledgerFor(month).balance();
  }

  totalIncome(): Money {
    return sumMoney(this.ledgers.map((ledger) => ledger.incomeTotal));
  }

  totalExpenses(): Money {
    return sumMoney(this.ledgers.map((ledger) => ledger.expenseTotal));
  }

  balance(): Money {
    return this.totalIncome().subtract(this.totalExpenses());
  }

  exceededMonths(): number[] {
    const ceiling = this.ceiling();
    if (!ceiling) {
      return [];
    }
    return this.ledgers
      .filter((ledger) => ledger.expenseTotal.greaterThan(ceiling))
      .map((ledger) => ledger.month);
  }

  months(): MonthFigures[] {
    return this.ledgers.map((ledger) => ledger.figures());
  }

  /**
   * Zeroes every month's expenses and installs a new goal limit. Income history is
   * kept.
   */
  reset(newGoalLimit: MoneyInput): void {
    const limit = Money.parse(newGoalLimit);
    if (!limit.isPositive()) {
      throw new LedgerError("INVALID_AMOUNT", "New goal limit must be greater than zero.", {
        value: limit.toString(),
      });
    }
    for (const ledger of this.ledgers) {
      ledger.clearExpenses();
    }
    this.goal = limit;
  }

  toSnapshot(): BudgetSnapshot {
    return {
      id: this.id,
      name: this.name,
      goalLimit: this.goal ? this.goal.toString() : null,
      months: this.ledgers.map((ledger) => ({
        month: ledger.month,
        incomeTotal: ledger.incomeTotal.toString(),
        expenseTotal: ledger.expenseTotal.toString(),
      })),
    };
  }

  private ceiling(): Money | undefined {
    return this.goal && this.goal.isPositive() ? this.goal : undefined;
  }

  private ledgerFor(month: number): MonthlyLedger {
    return this.ledgers[validateMonth(month) - 1];
  }
}
