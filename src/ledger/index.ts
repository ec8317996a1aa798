import type { AppConfig } from "../config";
import { CsvLedger } from "./csvLedger";
import { SqliteLedger } from "./sqliteLedger";
import type { Ledger } from "./types";

export interface CreateLedgerOptions {
  readOnly?: boolean;
}

export function createLedger(config: AppConfig, options: CreateLedgerOptions = {}): Ledger {
  switch (config.ledgerBackend) {
    case "csv":
      return new CsvLedger({
        ledgerPath: config.outputs.ledgerPath,
        metadataPath: config.outputs.metadataPath,
        metadataFields: config.site.metadataFields,
        createFiles: !options.readOnly,
      });
    case "sqlite":
      return new SqliteLedger(config.outputs.sqlitePath);
    default:
      throw new Error(`Unsupported ledger backend: ${String(config.ledgerBackend)}`);
  }
}

export * from "./csv";
export * from "./csvLedger";
export * from "./dryRunLedger";
export * from "./memoryLedger";
export * from "./sqliteLedger";
export * from "./types";
