import { randomUUID } from "node:crypto";
import { Budget } from "../ledger/budget";
import { LedgerError } from "../ledger/errors";
import type { Money, MoneyInput } from "../ledger/money";
import type { PersistenceGateway } from "../persistence/gateway";
import { TransactionStore } from "../transactions/store";
import {
  TransactionBuilder,
  fromTransactionRecord,
  monthOf,
  toTransactionRecord,
  type Transaction,
} from "../transactions/transaction";
import type { EnforcementMode, ExpenseOutcome, LedgerSnapshot, TransactionKind } from "../types";

export interface LedgerSessionOptions {
  gateway: PersistenceGateway;
  mode?: EnforcementMode;
  logger?: Pick<Console, "error" | "warn" | "info">;
  clock?: () => Date;
  generateId?: () => string;
}

export interface NewBudgetInput {
  id?: string;
  name: string;
  initialFunding: MoneyInput;
  goalLimit?: MoneyInput | null;
}

export interface EntryInput {
  amount: MoneyInput;
  category: string;
  description?: string;
  occurredOn?: string;
}

export interface RecordedIncome {
  transaction: Transaction;
  month: number;
  incomeTotal: Money;
}

export interface RecordedExpense {
  transaction: Transaction;
  outcome: ExpenseOutcome;
}

/**
 * Budgets and transactions for one application session. Callers must not start a
 * mutation while a `save` for the same user is pending.
 */
export class LedgerSession {
  readonly transactions = new TransactionStore();
  readonly mode: EnforcementMode;
  private readonly budgets = new Map<string, Budget>();
  private readonly gateway: PersistenceGateway;
  private readonly logger: Pick<Console, "error" | "warn" | "info">;
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(options: LedgerSessionOptions) {
    this.gateway = options.gateway;
    this.mode = options.mode ?? "reject";
    this.logger = options.logger ?? console;
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  hasBudget(userId: string): boolean {
    return this.budgets.has(userId);
  }

  getBudget(userId: string): Budget {
    const budget = this.budgets.get(userId);
    if (!budget) {
      throw new LedgerError("NOT_FOUND", `No budget exists for user ${userId}.`, { userId });
    }
    return budget;
  }

  createBudget(userId: string, input: NewBudgetInput): Budget {
    if (this.budgets.has(userId)) {
      throw new LedgerError("INVALID_FIELD", `User ${userId} already has a budget.`, { field: "userId" });
    }
    const budget = Budget.create(input.id ?? this.generateId(), input.name, input.initialFunding, {
      goalLimit: input.goalLimit,
      mode: this.mode,
    });
    this.budgets.set(userId, budget);
    return budget;
  }

  /** Returns the user's budget from memory, then storage, creating it on first use. */
  async ensureBudget(userId: string, defaults: NewBudgetInput): Promise<Budget> {
    const existing = this.budgets.get(userId);
    if (existing) {
      return existing;
    }
    if (await this.load(userId)) {
      return this.getBudget(userId);
    }
    const budget = this.createBudget(userId, defaults);
    this.logger.info(`Created budget ${budget.id} for user ${userId}`);
    return budget;
  }

  recordIncome(userId: string, entry: EntryInput): RecordedIncome {
    const budget = this.getBudget(userId);
    const transaction = this.buildTransaction("income", entry);
    const month = monthOf(transaction);
    const incomeTotal = budget.addIncome(month, transaction.category, transaction.amount);
    this.transactions.record(userId, transaction);
    return { transaction, month, incomeTotal };
  }

  recordExpense(userId: string, entry: EntryInput): RecordedExpense {
    const budget = this.getBudget(userId);
    const transaction = this.buildTransaction("expense", entry);
    const outcome = budget.addExpense(monthOf(transaction), transaction.category, transaction.amount);
    this.transactions.record(userId, transaction);
    if (outcome.exceeded) {
      this.logger.warn(
        `Budget ${budget.id} for user ${userId} is over its goal limit in month ${outcome.month}`,
      );
    }
    return { transaction, outcome };
  }

  resetBudget(userId: string, goalLimit: MoneyInput): Budget {
    const budget = this.getBudget(userId);
    budget.reset(goalLimit);
    return budget;
  }

  /** Writes the user's budget and transactions in one gateway call. */
  async save(userId: string): Promise<void> {
    const snapshot: LedgerSnapshot = {
      budget: this.getBudget(userId).toSnapshot(),
      transactions: this.transactions.list(userId).map(toTransactionRecord),
    };
    await this.gateway.saveLedger(userId, snapshot);
    this.logger.info(`Saved budget and ${snapshot.transactions.length} transactions for user ${userId}`);
  }

  /** Replaces the user's in-memory state from storage; false when nothing is stored. */
  async load(userId: string): Promise<boolean> {
    const snapshot = await this.gateway.loadLedger(userId);
    if (!snapshot) {
      return false;
    }
    const budget = Budget.fromSnapshot(snapshot.budget, { mode: this.mode });
    const transactions = snapshot.transactions.map(fromTransactionRecord);
    this.transactions.replace(userId, transactions);
    this.budgets.set(userId, budget);
    this.logger.info(`Loaded budget ${budget.id} and ${transactions.length} transactions for user ${userId}`);
    return true;
  }

  private buildTransaction(kind: TransactionKind, entry: EntryInput): Transaction {
    const builder = new TransactionBuilder({ generateId: this.generateId, clock: this.clock })
      .kind(kind)
      .category(entry.category)
      .amount(entry.amount);
    if (entry.description !== undefined) {
      builder.description(entry.description);
    }
    if (entry.occurredOn !== undefined) {
      builder.occurredOn(entry.occurredOn);
    }
    return builder.build();
  }
}
