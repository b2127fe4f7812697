import type { Money } from "../ledger/money";

export type TransactionKind = "income" | "expense";

export const TRANSACTION_KINDS: readonly TransactionKind[] = ["income", "expense"];

/**
 * How a budget treats an expense that would push a month over its goal limit:
 * `reject` refuses the expense, `warn` applies it and flags the month.
 */
export type EnforcementMode = "reject" | "warn";

/** Anything that can report a net balance. */
export interface BalanceBearing {
  balance(): Money;
}

export interface MonthFigures {
  month: number;
  incomeTotal: Money;
  expenseTotal: Money;
}

export interface ExpenseOutcome {
  month: number;
  expenseTotal: Money;
  exceeded: boolean;
}

export interface TransactionSummary {
  totalIncome: Money;
  totalExpenses: Money;
  netBalance: Money;
}

export interface MonthSummary {
  month: number;
  label: string;
  incomeTotal: Money;
  expenseTotal: Money;
  balance: Money;
  goalLimit: Money | null;
  remaining: Money | null;
  exceeded: boolean;
}

export interface YearSummary {
  budgetId: string;
  name: string;
  months: MonthSummary[];
  totalIncome: Money;
  totalExpenses: Money;
  balance: Money;
  exceeded: boolean;
  exceededMonths: number[];
}

export interface BudgetMonthSnapshot {
  month: number;
  incomeTotal: string;
  expenseTotal: string;
}

export interface BudgetSnapshot {
  id: string;
  name: string;
  goalLimit: string | null;
  months: BudgetMonthSnapshot[];
}

export interface TransactionRecord {
  id: string;
  amount: string;
  kind: TransactionKind;
  category: string;
  description: string;
  occurredOn: string; // YYYY-MM-DD
}

export type TransactionStoreSnapshot = Record<string, TransactionRecord[]>;

/** Everything stored for one user: the budget and that user's transactions. */
export interface LedgerSnapshot {
  budget: BudgetSnapshot;
  transactions: TransactionRecord[];
}
