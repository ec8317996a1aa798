import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { LedgerWriteError } from "../extract/errors";
import type { ItemKey, LedgerEntry, MetadataRow } from "../types";
import type { Ledger, LedgerStats } from "./types";
import { emptyStatusCounts, isLedgerStatus } from "./types";

type EntryRow = {
  page: number;
  rowIndex: number;
  displayName: string;
  identityFolio: string;
  outputReference: string | null;
  remoteReference: string | null;
  status: string;
  note: string;
};

type CountRow = { count: number };
type StatusCountRow = { status: string; count: number };

function toEntry(row: EntryRow): LedgerEntry | undefined {
  if (!isLedgerStatus(row.status)) {
    return undefined;
  }
  return {
    key: { pageNumber: row.page, rowIndex: row.rowIndex },
    displayName: row.displayName,
    identityFolio: row.identityFolio,
    outputReference: row.outputReference ?? undefined,
    remoteReference: row.remoteReference ?? undefined,
    status: row.status,
    note: row.note,
  };
}

/**
 * Same contract as the CSV ledger, kept in two insert-only tables. Nothing
 * here issues UPDATE or DELETE.
 */
export class SqliteLedger implements Ledger {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    const absolutePath = path.resolve(dbPath);
    fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
    this.db = new Database(absolutePath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = FULL");
    this.initializeSchema();
  }

  async wasCompleted(key: ItemKey): Promise<boolean> {
    return (await this.findSuccess(key)) !== undefined;
  }

  async findSuccess(key: ItemKey): Promise<LedgerEntry | undefined> {
    const row = this.db
      .prepare<[number, number], EntryRow>(
        `
        SELECT page, rowIndex, displayName, identityFolio, outputReference, remoteReference, status, note
        FROM ledger_entries
        WHERE page = ? AND rowIndex = ? AND status = 'success'
        ORDER BY id DESC
        LIMIT 1
      `,
      )
      .get(key.pageNumber, key.rowIndex);
    return row ? toEntry(row) : undefined;
  }

  async record(entry: LedgerEntry): Promise<void> {
    try {
      this.db
        .prepare(
          `
          INSERT INTO ledger_entries (
            page, rowIndex, displayName, identityFolio,
            outputReference, remoteReference, status, note, recordedAt
          )
          VALUES (
            @page, @rowIndex, @displayName, @identityFolio,
            @outputReference, @remoteReference, @status, @note, @recordedAt
          )
        `,
        )
        .run({
          page: entry.key.pageNumber,
          rowIndex: entry.key.rowIndex,
          displayName: entry.displayName,
          identityFolio: entry.identityFolio,
          outputReference: entry.outputReference ?? null,
          remoteReference: entry.remoteReference ?? null,
          status: entry.status,
          note: entry.note,
          recordedAt: new Date().toISOString(),
        });
    } catch (error) {
      throw new LedgerWriteError("ledger", error);
    }
  }

  async recordMetadata(row: MetadataRow): Promise<void> {
    try {
      this.db
        .prepare(
          `
          INSERT INTO metadata_rows (
            page, rowIndex, fieldsJson, outputFilename, remoteReference, recordedAt
          )
          VALUES (@page, @rowIndex, @fieldsJson, @outputFilename, @remoteReference, @recordedAt)
        `,
        )
        .run({
          page: row.key.pageNumber,
          rowIndex: row.key.rowIndex,
          fieldsJson: JSON.stringify(Object.fromEntries(row.metadata)),
          outputFilename: row.outputFilename ?? null,
          remoteReference: row.remoteReference ?? null,
          recordedAt: new Date().toISOString(),
        });
    } catch (error) {
      throw new LedgerWriteError("metadata", error);
    }
  }

  async listEntries(): Promise<LedgerEntry[]> {
    const rows = this.db
      .prepare<[], EntryRow>(
        `
        SELECT page, rowIndex, displayName, identityFolio, outputReference, remoteReference, status, note
        FROM ledger_entries
        ORDER BY id ASC
      `,
      )
      .all();

    const entries: LedgerEntry[] = [];
    for (const row of rows) {
      const entry = toEntry(row);
      if (entry) {
        entries.push(entry);
      }
    }
    return entries;
  }

  async getStats(): Promise<LedgerStats> {
    const byStatus = emptyStatusCounts();
    let totalEntries = 0;
    const statusRows = this.db
      .prepare<[], StatusCountRow>("SELECT status, COUNT(*) AS count FROM ledger_entries GROUP BY status")
      .all();
    for (const row of statusRows) {
      if (isLedgerStatus(row.status)) {
        byStatus[row.status] = row.count;
        totalEntries += row.count;
      }
    }

    const completed = this.db
      .prepare<[], CountRow>(
        `
        SELECT COUNT(*) AS count FROM (
          SELECT DISTINCT page, rowIndex FROM ledger_entries WHERE status = 'success'
        )
      `,
      )
      .get();
    const metadata = this.db.prepare<[], CountRow>("SELECT COUNT(*) AS count FROM metadata_rows").get();

    return {
      totalEntries,
      byStatus,
      completedKeys: completed?.count ?? 0,
      metadataRows: metadata?.count ?? 0,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ledger_entries (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        page INTEGER NOT NULL,
        rowIndex INTEGER NOT NULL,
        displayName TEXT NOT NULL,
        identityFolio TEXT NOT NULL,
        outputReference TEXT NULL,
        remoteReference TEXT NULL,
        status TEXT NOT NULL,
        note TEXT NOT NULL,
        recordedAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS metadata_rows (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        page INTEGER NOT NULL,
        rowIndex INTEGER NOT NULL,
        fieldsJson TEXT NOT NULL,
        outputFilename TEXT NULL,
        remoteReference TEXT NULL,
        recordedAt TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_ledger_entries_key ON ledger_entries(page, rowIndex, status);
      CREATE INDEX IF NOT EXISTS idx_metadata_rows_key ON metadata_rows(page, rowIndex);
    `);
  }
}
