import { LedgerError } from "../ledger/errors";
import { Money, parseNonNegative, sumMoney, type MoneyInput } from "../ledger/money";
import type { TransactionKind, TransactionStoreSnapshot, TransactionSummary } from "../types";
import { fromTransactionRecord, toTransactionRecord, type Transaction } from "./transaction";

function requireUserId(userId: string): string {
  if (typeof userId !== "string" || userId.length === 0) {
    throw new LedgerError("INVALID_FIELD", "User id cannot be empty.", { field: "userId" });
  }
  return userId;
}

/**
 * Per-user, append-only sequences of transactions. Entries are never removed one at
 * a time; `replace` and `clear` are the only bulk operations.
 */
export class TransactionStore {
  private readonly entries = new Map<string, Transaction[]>();

  static fromSnapshot(snapshot: TransactionStoreSnapshot): TransactionStore {
    const store = new TransactionStore();
    for (const [userId, records] of Object.entries(snapshot)) {
      store.replace(userId, records.map(fromTransactionRecord));
    }
    return store;
  }

  /** Appends a transaction; returns false when its id is already recorded for the user. */
  record(userId: string, transaction: Transaction): boolean {
    const sequence = this.entries.get(requireUserId(userId)) ?? [];
    if (sequence.some((existing) => existing.id === transaction.id)) {
      return false;
    }
    sequence.push(transaction);
    this.entries.set(userId, sequence);
    return true;
  }

  list(userId: string): readonly Transaction[] {
    return [...(this.entries.get(requireUserId(userId)) ?? [])];
  }

  users(): string[] {
    return [...this.entries.keys()];
  }

  totalsByKind(userId: string, kind: TransactionKind): Money {
    return sumMoney(
      this.list(userId)
        .filter((transaction) => transaction.kind === kind)
        .map((transaction) => transaction.amount),
    );
  }

  /** Expense totals per category; categories that sum to zero are left out. */
  totalsByCategory(userId: string): Record<string, Money> {
    const totals = this.list(userId)
      .filter((transaction) => transaction.kind === "expense")
      .reduce<Map<string, Money>>((accumulator, transaction) => {
        const current = accumulator.get(transaction.category) ?? Money.zero();
        accumulator.set(transaction.category, current.add(transaction.amount));
        return accumulator;
      }, new Map());
    return Object.fromEntries([...totals].filter(([, total]) => !total.isZero()));
  }

  /** Expenses whose own amount is over the ceiling, in recorded order. */
  exceeding(userId: string, ceiling: MoneyInput): Transaction[] {
    const limit = parseNonNegative(ceiling, "Ceiling");
    return this.list(userId).filter(
      (transaction) => transaction.kind === "expense" && transaction.amount.greaterThan(limit),
    );
  }

  countByCategory(userId: string, category: string): number {
    if (typeof category !== "string" || category.length === 0) {
      throw new LedgerError("INVALID_FIELD", "Category cannot be empty.", { field: "category" });
    }
    const needle = category.toLowerCase();
    return this.list(userId).filter((transaction) => transaction.category.toLowerCase() === needle).length;
  }

  summary(userId: string): TransactionSummary {
    const totalIncome = this.totalsByKind(userId, "income");
    const totalExpenses = this.totalsByKind(userId, "expense");
    return {
      totalIncome,
      totalExpenses,
      netBalance: totalIncome.subtract(totalExpenses),
    };
  }

  replace(userId: string, transactions: readonly Transaction[]): void {
    requireUserId(userId);
    const ids = new Set(transactions.map((transaction) => transaction.id));
    if (ids.size !== transactions.length) {
      throw new LedgerError("INVALID_FIELD", "Transaction ids must be unique per user.", { userId });
    }
    this.entries.set(userId, [...transactions]);
  }

  /** Removes every transaction recorded for the user and returns how many there were. */
  clear(userId: string): number {
    const removed = this.entries.get(requireUserId(userId))?.length ?? 0;
    this.entries.delete(userId);
    return removed;
  }

  toSnapshot(): TransactionStoreSnapshot {
    return Object.fromEntries(
      [...this.entries].map(([userId, transactions]) => [userId, transactions.map(toTransactionRecord)]),
    );
  }
}
