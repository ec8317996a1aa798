import type { ItemKey, LedgerEntry, MetadataRow } from "../types";
import type { Ledger, LedgerStats } from "./types";
import { summarizeEntries } from "./types";

function sameKey(a: ItemKey, b: ItemKey): boolean {
  return a.pageNumber === b.pageNumber && a.rowIndex === b.rowIndex;
}

export class InMemoryLedger implements Ledger {
  readonly entries: LedgerEntry[] = [];
  readonly metadataRows: MetadataRow[] = [];

  constructor(seed: LedgerEntry[] = []) {
    this.entries.push(...seed);
  }

  async wasCompleted(key: ItemKey): Promise<boolean> {
    return this.entries.some((entry) => entry.status === "success" && sameKey(entry.key, key));
  }

  async findSuccess(key: ItemKey): Promise<LedgerEntry | undefined> {
    for (let i = this.entries.length - 1; i >= 0; i -= 1) {
      const entry = this.entries[i];
      if (entry.status === "success" && sameKey(entry.key, key)) {
        return entry;
      }
    }
    return undefined;
  }

  async record(entry: LedgerEntry): Promise<void> {
    this.entries.push({ ...entry, key: { ...entry.key } });
  }

  async recordMetadata(row: MetadataRow): Promise<void> {
    this.metadataRows.push({ ...row, key: { ...row.key } });
  }

  async listEntries(): Promise<LedgerEntry[]> {
    return [...this.entries];
  }

  async getStats(): Promise<LedgerStats> {
    return summarizeEntries(this.entries, this.metadataRows.length);
  }

  async close(): Promise<void> {
    return;
  }
}
