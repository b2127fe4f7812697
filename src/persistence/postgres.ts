import { asc, eq } from "drizzle-orm";
import { schema, type Database } from "../db/client";
import type { LedgerSnapshot } from "../types";
import { persistenceFailure, type PersistenceGateway } from "./gateway";
import { LedgerSnapshotSchema } from "./schemas";

/**
 * Stores ledgers in the `budgets`, `budget_months` and `ledger_transactions` tables.
 * Each save rewrites one user's rows inside a single database transaction.
 */
export class PostgresPersistenceGateway implements PersistenceGateway {
  constructor(private readonly db: Database) {}

  async saveLedger(userId: string, snapshot: LedgerSnapshot): Promise<void> {
    const { budget, transactions } = snapshot;
    try {
      await this.db.transaction(async (tx) => {
        await tx
          .insert(schema.budgets)
          .values({
            userId,
            budgetId: budget.id,
            name: budget.name,
            goalLimit: budget.goalLimit,
          })
          .onConflictDoUpdate({
            target: schema.budgets.userId,
            set: {
              budgetId: budget.id,
              name: budget.name,
              goalLimit: budget.goalLimit,
              updatedAt: new Date(),
            },
          });
        await tx.delete(schema.budgetMonths).where(eq(schema.budgetMonths.userId, userId));
        await tx.insert(schema.budgetMonths).values(
          budget.months.map((entry) => ({
            userId,
            month: entry.month,
            incomeTotal: entry.incomeTotal,
            expenseTotal: entry.expenseTotal,
          })),
        );
        await tx.delete(schema.ledgerTransactions).where(eq(schema.ledgerTransactions.userId, userId));
        if (!transactions.length) {
          return;
        }
        await tx.insert(schema.ledgerTransactions).values(
          transactions.map((record, position) => ({
            id: record.id,
            userId,
            position,
            amount: record.amount,
            kind: record.kind,
            category: record.category,
            description: record.description,
            occurredOn: record.occurredOn,
          })),
        );
      });
    } catch (error) {
      throw persistenceFailure("save ledger", error);
    }
  }

  async loadLedger(userId: string): Promise<LedgerSnapshot | null> {
    try {
      const [budget] = await this.db
        .select()
        .from(schema.budgets)
        .where(eq(schema.budgets.userId, userId))
        .limit(1);
      if (!budget) {
        return null;
      }
      const months = await this.db
        .select()
        .from(schema.budgetMonths)
        .where(eq(schema.budgetMonths.userId, userId))
        .orderBy(asc(schema.budgetMonths.month));
      const transactions = await this.db
        .select()
        .from(schema.ledgerTransactions)
        .where(eq(schema.ledgerTransactions.userId, userId))
        .orderBy(asc(schema.ledgerTransactions.position));
      return LedgerSnapshotSchema.parse({
        budget: {
          id: budget.budgetId,
          name: budget.name,
          goalLimit: budget.goalLimit,
          months: months.map((row) => ({
            month: row.month,
            incomeTotal: row.incomeTotal,
            expenseTotal: row.expenseTotal,
          })),
        },
        transactions: transactions.map((row) => ({
          id: row.id,
          amount: row.amount,
          kind: row.kind,
          category: row.category,
          description: row.description,
          occurredOn: row.occurredOn,
        })),
      });
    } catch (error) {
      throw persistenceFailure("load ledger", error);
    }
  }
}
