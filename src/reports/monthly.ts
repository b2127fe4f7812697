import { MONTHS_PER_YEAR, type Budget } from "../ledger/budget";
import type { MonthSummary, YearSummary } from "../types";

const MONTH_LABELS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

export function monthLabel(month: number): string {
  return MONTH_LABELS[month - 1] ?? `Month ${month}`;
}

export function summarizeMonth(budget: Budget, month: number): MonthSummary {
  const incomeTotal = budget.monthlyIncome(month);
  const expenseTotal = budget.monthlyExpenses(month);
  const goalLimit = budget.goalLimit;

  return {
    month,
    label: monthLabel(month),
    incomeTotal,
    expenseTotal,
    balance: incomeTotal.subtract(expenseTotal),
    goalLimit,
    remaining: goalLimit ? goalLimit.subtract(expenseTotal) : null,
    exceeded: goalLimit !== null && goalLimit.isPositive() && expenseTotal.greaterThan(goalLimit),
  };
}

export function summarizeYear(budget: Budget): YearSummary {
  const months = Array.from({ length: MONTHS_PER_YEAR }, (_, index) => summarizeMonth(budget, index + 1));
  const exceededMonths = budget.exceededMonths();

  return {
    budgetId: budget.id,
    name: budget.name,
    months,
    totalIncome: budget.totalIncome(),
    totalExpenses: budget.totalExpenses(),
    balance: budget.balance(),
    exceeded: exceededMonths.length > 0,
    exceededMonths,
  };
}
