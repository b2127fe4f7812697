import type { Budget } from "../ledger/budget";
import { isLedgerError } from "../ledger/errors";
import type { EntryInput, LedgerSession, NewBudgetInput } from "./ledger-session";

export interface LedgerSeed {
  budget: NewBudgetInput;
  income: EntryInput[];
  expenses: EntryInput[];
}

export interface SeedResult {
  /** False when the user already had a stored ledger and nothing was recorded. */
  seeded: boolean;
  budget: Budget;
  /** Expenses the budget refused under its goal limit. */
  skipped: EntryInput[];
}

/**
 * Creates and saves a ledger for a user that has none stored. Running it again
 * against the same storage loads the existing ledger and records nothing.
 */
export async function seedLedger(session: LedgerSession, userId: string, seed: LedgerSeed): Promise<SeedResult> {
  if (await session.load(userId)) {
    return { seeded: false, budget: session.getBudget(userId), skipped: [] };
  }
  const budget = session.createBudget(userId, seed.budget);
  for (const entry of seed.income) {
    session.recordIncome(userId, entry);
  }
  const skipped: EntryInput[] = [];
  for (const entry of seed.expenses) {
    try {
      session.recordExpense(userId, entry);
    } catch (error) {
      if (!isLedgerError(error, "BUDGET_EXCEEDED")) {
        throw error;
      }
      skipped.push(entry);
    }
  }
  await session.save(userId);
  return { seeded: true, budget, skipped };
}
