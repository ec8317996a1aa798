import type { ItemKey, LedgerEntry, LedgerStatus, MetadataRow } from "../types";

export interface LedgerStats {
  totalEntries: number;
  byStatus: Record<LedgerStatus, number>;
  completedKeys: number;
  metadataRows: number;
}

/**
 * Append-only record of every attempt. A key counts as completed when any
 * entry for it has status `success`; entries are never rewritten.
 */
export interface Ledger {
  wasCompleted(key: ItemKey): Promise<boolean>;
  findSuccess(key: ItemKey): Promise<LedgerEntry | undefined>;
  record(entry: LedgerEntry): Promise<void>;
  recordMetadata(row: MetadataRow): Promise<void>;
  listEntries(): Promise<LedgerEntry[]>;
  getStats(): Promise<LedgerStats>;
  close(): Promise<void>;
}

export function isLedgerStatus(value: string): value is LedgerStatus {
  return value === "success" || value === "confidential" || value === "error" || value === "skipped";
}

export function emptyStatusCounts(): Record<LedgerStatus, number> {
  return { success: 0, confidential: 0, error: 0, skipped: 0 };
}

export function summarizeEntries(entries: LedgerEntry[], metadataRows: number): LedgerStats {
  const byStatus = emptyStatusCounts();
  const completed = new Set<string>();
  for (const entry of entries) {
    byStatus[entry.status] += 1;
    if (entry.status === "success") {
      completed.add(`${entry.key.pageNumber}:${entry.key.rowIndex}`);
    }
  }
  return { totalEntries: entries.length, byStatus, completedKeys: completed.size, metadataRows };
}
