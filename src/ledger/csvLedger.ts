import fs from "node:fs";
import path from "node:path";
import { LedgerWriteError } from "../extract/errors";
import type { ItemKey, LedgerEntry, MetadataRow } from "../types";
import { formatItemKey, metadataValue } from "../types";
import { encodeCsvRow, parseCsv, scanCsv, withoutTornQuotedTail } from "./csv";
import type { Ledger, LedgerStats } from "./types";
import { isLedgerStatus, summarizeEntries } from "./types";

export const LEDGER_HEADER = ["page", "row_index", "name", "folio", "filename", "api_url", "status", "notes"] as const;
export const METADATA_RESULT_COLUMNS = ["pdf_filename", "api_url", "page", "row_index"] as const;

export interface CsvLedgerOptions {
  ledgerPath: string;
  metadataPath: string;
  metadataFields: string[];
  /** When false, nothing is created on disk until the first append. */
  createFiles?: boolean;
}

const INTEGER = /^\d+$/;

async function appendDurably(filePath: string, content: string): Promise<void> {
  const handle = await fs.promises.open(filePath, "a");
  try {
    await handle.appendFile(content, "utf-8");
    await handle.datasync();
  } finally {
    await handle.close();
  }
}

/**
 * Makes the next append start a fresh record after a crash mid-row: a row
 * torn inside a quoted field is cut back, any other partial row is terminated.
 */
async function repairTornTail(filePath: string): Promise<void> {
  if (!fs.existsSync(filePath)) {
    return;
  }
  const text = await fs.promises.readFile(filePath, "utf-8");
  const scan = scanCsv(text);
  if (scan.openQuote) {
    await fs.promises.truncate(filePath, Buffer.byteLength(text.slice(0, scan.boundary), "utf-8"));
    return;
  }
  if (text.length > 0 && !text.endsWith("\n")) {
    await appendDurably(filePath, "\r\n");
  }
}

function isMissingOrEmpty(filePath: string): boolean {
  return !fs.existsSync(filePath) || fs.statSync(filePath).size === 0;
}

export function parseLedgerRow(row: string[]): LedgerEntry | undefined {
  if (row.length < 7 || !INTEGER.test(row[0]) || !INTEGER.test(row[1])) {
    return undefined;
  }
  const status = row[6];
  if (!isLedgerStatus(status)) {
    return undefined;
  }
  return {
    key: { pageNumber: Number.parseInt(row[0], 10), rowIndex: Number.parseInt(row[1], 10) },
    displayName: row[2],
    identityFolio: row[3],
    outputReference: row[4] || undefined,
    remoteReference: row[5] || undefined,
    status,
    note: row[7] ?? "",
  };
}

export class CsvLedger implements Ledger {
  private readonly ledgerPath: string;
  private readonly metadataPath: string;
  private readonly metadataFields: string[];
  private completed?: Map<string, LedgerEntry>;
  private readonly repaired = new Set<string>();

  constructor(options: CsvLedgerOptions) {
    this.ledgerPath = path.resolve(options.ledgerPath);
    this.metadataPath = path.resolve(options.metadataPath);
    this.metadataFields = options.metadataFields;
    if (options.createFiles ?? true) {
      this.initializeFiles();
    }
  }

  async wasCompleted(key: ItemKey): Promise<boolean> {
    const index = await this.completedIndex();
    return index.has(formatItemKey(key));
  }

  async findSuccess(key: ItemKey): Promise<LedgerEntry | undefined> {
    const index = await this.completedIndex();
    return index.get(formatItemKey(key));
  }

  async record(entry: LedgerEntry): Promise<void> {
    const line = encodeCsvRow([
      entry.key.pageNumber,
      entry.key.rowIndex,
      entry.displayName,
      entry.identityFolio,
      entry.outputReference ?? "",
      entry.remoteReference ?? "",
      entry.status,
      entry.note,
    ]);

    try {
      await this.prepareAppend(this.ledgerPath);
      if (isMissingOrEmpty(this.ledgerPath)) {
        fs.mkdirSync(path.dirname(this.ledgerPath), { recursive: true });
        await appendDurably(this.ledgerPath, encodeCsvRow(LEDGER_HEADER));
      }
      await appendDurably(this.ledgerPath, line);
    } catch (error) {
      throw new LedgerWriteError("ledger", error);
    }

    if (entry.status === "success" && this.completed) {
      this.completed.set(formatItemKey(entry.key), entry);
    }
  }

  async recordMetadata(row: MetadataRow): Promise<void> {
    const values = [
      ...this.metadataFields.map((field) => metadataValue(row.metadata, field)),
      row.outputFilename ?? "",
      row.remoteReference ?? "",
      row.key.pageNumber,
      row.key.rowIndex,
    ];

    try {
      await this.prepareAppend(this.metadataPath);
      if (isMissingOrEmpty(this.metadataPath)) {
        fs.mkdirSync(path.dirname(this.metadataPath), { recursive: true });
        await appendDurably(this.metadataPath, this.metadataHeader());
      }
      await appendDurably(this.metadataPath, encodeCsvRow(values));
    } catch (error) {
      throw new LedgerWriteError("metadata", error);
    }
  }

  async listEntries(): Promise<LedgerEntry[]> {
    const rows = parseCsv(withoutTornQuotedTail(await this.readIfExists(this.ledgerPath)));
    const entries: LedgerEntry[] = [];
    for (const row of rows) {
      const entry = parseLedgerRow(row);
      if (entry) {
        entries.push(entry);
      }
    }
    return entries;
  }

  async getStats(): Promise<LedgerStats> {
    const entries = await this.listEntries();
    const metadataRows = parseCsv(withoutTornQuotedTail(await this.readIfExists(this.metadataPath))).filter(
      (row) => row.length >= 2 && INTEGER.test(row[row.length - 1]) && INTEGER.test(row[row.length - 2]),
    ).length;
    return summarizeEntries(entries, metadataRows);
  }

  async close(): Promise<void> {
    this.completed = undefined;
  }

  private async completedIndex(): Promise<Map<string, LedgerEntry>> {
    if (this.completed) {
      return this.completed;
    }

    const index = new Map<string, LedgerEntry>();
    for (const entry of await this.listEntries()) {
      if (entry.status === "success") {
        index.set(formatItemKey(entry.key), entry);
      }
    }
    this.completed = index;
    return index;
  }

  private async prepareAppend(filePath: string): Promise<void> {
    if (this.repaired.has(filePath)) {
      return;
    }
    await repairTornTail(filePath);
    this.repaired.add(filePath);
  }

  private async readIfExists(filePath: string): Promise<string> {
    if (!fs.existsSync(filePath)) {
      return "";
    }
    return fs.promises.readFile(filePath, "utf-8");
  }

  private metadataHeader(): string {
    return encodeCsvRow([...this.metadataFields, ...METADATA_RESULT_COLUMNS]);
  }

  private initializeFiles(): void {
    fs.mkdirSync(path.dirname(this.ledgerPath), { recursive: true });
    fs.mkdirSync(path.dirname(this.metadataPath), { recursive: true });
    if (isMissingOrEmpty(this.ledgerPath)) {
      fs.writeFileSync(this.ledgerPath, encodeCsvRow(LEDGER_HEADER), "utf-8");
    }
    if (isMissingOrEmpty(this.metadataPath)) {
      fs.writeFileSync(this.metadataPath, this.metadataHeader(), "utf-8");
    }
  }
}
