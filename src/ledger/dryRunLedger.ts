import type { Logger } from "../observability";
import type { ItemKey, LedgerEntry, MetadataRow } from "../types";
import type { Ledger, LedgerStats } from "./types";

/** Reads go to the real ledger; appends are logged and dropped. */
export class DryRunLedger implements Ledger {
  private readonly inner: Ledger;
  private readonly logger: Logger;

  constructor(inner: Ledger, logger: Logger) {
    this.inner = inner;
    this.logger = logger;
  }

  wasCompleted(key: ItemKey): Promise<boolean> {
    return this.inner.wasCompleted(key);
  }

  findSuccess(key: ItemKey): Promise<LedgerEntry | undefined> {
    return this.inner.findSuccess(key);
  }

  async record(entry: LedgerEntry): Promise<void> {
    this.logger.info("ledger_record_dry_run", {
      page: entry.key.pageNumber,
      rowIndex: entry.key.rowIndex,
      status: entry.status,
      note: entry.note,
      outputReference: entry.outputReference,
    });
  }

  async recordMetadata(row: MetadataRow): Promise<void> {
    this.logger.debug("metadata_record_dry_run", {
      page: row.key.pageNumber,
      rowIndex: row.key.rowIndex,
      fields: Object.fromEntries(row.metadata),
    });
  }

  listEntries(): Promise<LedgerEntry[]> {
    return this.inner.listEntries();
  }

  getStats(): Promise<LedgerStats> {
    return this.inner.getStats();
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}
