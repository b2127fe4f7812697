import { randomUUID } from "node:crypto";
import { z } from "zod";
import { LedgerError } from "../ledger/errors";
import { Money, parseNonNegative, type MoneyInput } from "../ledger/money";
import { TRANSACTION_KINDS, type TransactionKind, type TransactionRecord } from "../types";

export interface Transaction {
  readonly id: string;
  readonly amount: Money;
  readonly kind: TransactionKind;
  readonly category: string;
  readonly description: string;
  readonly occurredOn: string;
}

export interface TransactionBuilderOptions {
  generateId?: () => string;
  clock?: () => Date;
}

const occurredOnSchema = z.string().date();

function isTransactionKind(value: unknown): value is TransactionKind {
  return TRANSACTION_KINDS.some((kind) => kind === value);
}

function invalidField(field: string, message: string): LedgerError {
  return new LedgerError("INVALID_FIELD", message, { field });
}

/** Month (1-12) a transaction falls into. */
export function monthOf(transaction: Pick<Transaction, "occurredOn">): number {
  return Number(transaction.occurredOn.slice(5, 7));
}

/**
 * Accumulates the fields of a transaction, validating each one as it is set so a
 * bad value fails at the call that supplied it.
 */
export class TransactionBuilder {
  private descriptionValue = "";
  private categoryValue?: string;
  private amountValue?: Money;
  private kindValue?: TransactionKind;
  private occurredOnValue?: string;
  private readonly generateId: () => string;
  private readonly clock: () => Date;

  constructor(options: TransactionBuilderOptions = {}) {
    this.generateId = options.generateId ?? randomUUID;
    this.clock = options.clock ?? (() => new Date());
  }

  description(value: string): this {
    if (typeof value !== "string") {
      throw invalidField("description", "Description must be text.");
    }
    this.descriptionValue = value.trim();
    return this;
  }

  category(value: string): this {
    if (typeof value !== "string" || value.trim().length === 0) {
      throw invalidField("category", "Category cannot be empty.");
    }
    this.categoryValue = value.trim();
    return this;
  }

  amount(value: MoneyInput): this {
    this.amountValue = parseNonNegative(value);
    return this;
  }

  kind(value: string): this {
    if (!isTransactionKind(value)) {
      throw invalidField("kind", "Transaction kind must be income or expense.");
    }
    this.kindValue = value;
    return this;
  }

  occurredOn(value: string): this {
    if (!occurredOnSchema.safeParse(value).success) {
      throw invalidField("occurredOn", "Date must be a calendar date in YYYY-MM-DD form.");
    }
    this.occurredOnValue = value;
    return this;
  }

  build(): Transaction {
    const { categoryValue: category, amountValue: amount, kindValue: kind } = this;
    if (category === undefined) {
      throw invalidField("category", "Category is required.");
    }
    if (amount === undefined) {
      throw invalidField("amount", "Amount is required.");
    }
    if (kind === undefined) {
      throw invalidField("kind", "Transaction kind is required.");
    }
    return Object.freeze({
      id: this.generateId(),
      amount,
      kind,
      category,
      description: this.descriptionValue,
      occurredOn: this.occurredOnValue ?? this.clock().toISOString().slice(0, 10),
    });
  }
}

export function toTransactionRecord(transaction: Transaction): TransactionRecord {
  return {
    id: transaction.id,
    amount: transaction.amount.toString(),
    kind: transaction.kind,
    category: transaction.category,
    description: transaction.description,
    occurredOn: transaction.occurredOn,
  };
}

/** Rebuilds a stored transaction, keeping its original id. */
export function fromTransactionRecord(record: TransactionRecord): Transaction {
  const draft = new TransactionBuilder({ generateId: () => record.id })
    .kind(record.kind)
    .category(record.category)
    .amount(record.amount)
    .description(record.description)
    .occurredOn(record.occurredOn);
  return draft.build();
}
