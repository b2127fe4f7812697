import { z } from "zod";
import { MONTHS_PER_YEAR } from "../ledger/budget";

export const StoredAmountSchema = z
  .string()
  .regex(/^\d+(\.\d{1,2})?$/, "Amount must be a non-negative decimal with at most two fraction digits");

export const BudgetMonthSnapshotSchema = z.object({
  month: z.number().int().min(1).max(MONTHS_PER_YEAR),
  incomeTotal: StoredAmountSchema,
  expenseTotal: StoredAmountSchema,
});

export const BudgetSnapshotSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  goalLimit: StoredAmountSchema.nullable(),
  months: z
    .array(BudgetMonthSnapshotSchema)
    .length(MONTHS_PER_YEAR)
    .refine((months) => new Set(months.map((entry) => entry.month)).size === MONTHS_PER_YEAR, {
      message: "Each month must appear exactly once",
    }),
});

export const TransactionKindEnum = z.enum(["income", "expense"]);

export const TransactionRecordSchema = z.object({
  id: z.string().min(1),
  amount: StoredAmountSchema,
  kind: TransactionKindEnum,
  category: z.string().trim().min(1),
  description: z.string(),
  occurredOn: z.string().date(),
});

const UserTransactionsSchema = z
  .array(TransactionRecordSchema)
  .refine((records) => new Set(records.map((record) => record.id)).size === records.length, {
    message: "Transaction ids must be unique per user",
  });

export const TransactionStoreSnapshotSchema = z.record(z.string().min(1), UserTransactionsSchema);

export const LedgerSnapshotSchema = z.object({
  budget: BudgetSnapshotSchema,
  transactions: UserTransactionsSchema,
});
