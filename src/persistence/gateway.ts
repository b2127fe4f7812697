import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { LedgerError, isLedgerError } from "../ledger/errors";
import type { LedgerSnapshot } from "../types";
import { decodeLedgerSnapshot, encodeSnapshot } from "./snapshot";

/**
 * Durable storage for per-user ledger snapshots. A save replaces the user's budget
 * and transactions together or not at all, and never touches another user's data.
 * Implementations report every storage failure as a `PERSISTENCE_FAILURE` LedgerError.
 */
export interface PersistenceGateway {
  saveLedger(userId: string, snapshot: LedgerSnapshot): Promise<void>;
  /** Resolves to null when nothing has been stored for the user. */
  loadLedger(userId: string): Promise<LedgerSnapshot | null>;
}

export function persistenceFailure(action: string, error: unknown): LedgerError {
  if (isLedgerError(error, "PERSISTENCE_FAILURE")) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new LedgerError("PERSISTENCE_FAILURE", `Failed to ${action}: ${reason}`, { action }, { cause: error });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** One `ledgers/<user>.json` document per user under the data directory. */
export class FilePersistenceGateway implements PersistenceGateway {
  constructor(private readonly dataDir: string) {}

  async saveLedger(userId: string, snapshot: LedgerSnapshot): Promise<void> {
    const filePath = this.ledgerPath(userId);
    // the stored file is only ever replaced by rename
    const pending = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
    } catch (error) {
      throw persistenceFailure("save ledger", error);
    }
    try {
      await writeFile(pending, encodeSnapshot(snapshot));
      await rename(pending, filePath);
    } catch (error) {
      await rm(pending, { force: true });
      throw persistenceFailure("save ledger", error);
    }
  }

  async loadLedger(userId: string): Promise<LedgerSnapshot | null> {
    let bytes: Buffer;
    try {
      bytes = await readFile(this.ledgerPath(userId));
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw persistenceFailure("load ledger", error);
    }
    return decodeLedgerSnapshot(bytes);
  }

  private ledgerPath(userId: string): string {
    return path.join(this.dataDir, "ledgers", `${encodeURIComponent(userId)}.json`);
  }
}
