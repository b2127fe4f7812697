import type { ZodTypeAny, z } from "zod";
import { Budget, type BudgetOptions } from "../ledger/budget";
import { LedgerError } from "../ledger/errors";
import { TransactionStore } from "../transactions/store";
import type { BudgetSnapshot, LedgerSnapshot, TransactionStoreSnapshot } from "../types";
import { BudgetSnapshotSchema, LedgerSnapshotSchema, TransactionStoreSnapshotSchema } from "./schemas";

export function encodeSnapshot(snapshot: BudgetSnapshot | TransactionStoreSnapshot | LedgerSnapshot): Buffer {
  return Buffer.from(JSON.stringify(snapshot), "utf8");
}

function decode<T extends ZodTypeAny>(bytes: Uint8Array, schema: T, label: string): z.infer<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(bytes).toString("utf8"));
  } catch (error) {
    throw new LedgerError("PERSISTENCE_FAILURE", `Stored ${label} is not valid JSON.`, undefined, { cause: error });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new LedgerError(
      "PERSISTENCE_FAILURE",
      `Stored ${label} does not match the expected layout.`,
      {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path,
          message: issue.message,
        })),
      },
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

export function decodeBudgetSnapshot(bytes: Uint8Array): BudgetSnapshot {
  return decode(bytes, BudgetSnapshotSchema, "budget");
}

export function decodeTransactionStoreSnapshot(bytes: Uint8Array): TransactionStoreSnapshot {
  return decode(bytes, TransactionStoreSnapshotSchema, "transactions");
}

export function decodeLedgerSnapshot(bytes: Uint8Array): LedgerSnapshot {
  return decode(bytes, LedgerSnapshotSchema, "ledger");
}

export function serializeBudget(budget: Budget): Buffer {
  return encodeSnapshot(budget.toSnapshot());
}

export function deserializeBudget(bytes: Uint8Array, options: Pick<BudgetOptions, "mode"> = {}): Budget {
  return Budget.fromSnapshot(decodeBudgetSnapshot(bytes), options);
}

export function serializeTransactionStore(store: TransactionStore): Buffer {
  return encodeSnapshot(store.toSnapshot());
}

export function deserializeTransactionStore(bytes: Uint8Array): TransactionStore {
  return TransactionStore.fromSnapshot(decodeTransactionStoreSnapshot(bytes));
}
