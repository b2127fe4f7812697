import type { LedgerSnapshot } from "../types";
import type { PersistenceGateway } from "./gateway";
import { decodeLedgerSnapshot, encodeSnapshot } from "./snapshot";

/** Keeps encoded snapshots in process memory; nothing survives a restart. */
export class InMemoryPersistenceGateway implements PersistenceGateway {
  private readonly ledgers = new Map<string, Buffer>();

  async saveLedger(userId: string, snapshot: LedgerSnapshot): Promise<void> {
    this.ledgers.set(userId, encodeSnapshot(snapshot));
  }

  async loadLedger(userId: string): Promise<LedgerSnapshot | null> {
    const bytes = this.ledgers.get(userId);
    return bytes ? decodeLedgerSnapshot(bytes) : null;
  }

  clear(): void {
    this.ledgers.clear();
  }
}
