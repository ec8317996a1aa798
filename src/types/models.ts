export interface ItemKey {
  pageNumber: number;
  rowIndex: number;
}

/** Ordered field name/value pairs read from a listing row. */
export type ItemMetadata = ReadonlyArray<readonly [field: string, value: string]>;

export type LedgerStatus = "success" | "confidential" | "error" | "skipped";

export type ItemErrorKind =
  | "TriggerNotFound"
  | "SurfaceTimeout"
  | "CaptureFailed"
  | "WriteFailed"
  | "IndexOutOfBounds"
  | "Unhandled";

export interface LedgerEntry {
  key: ItemKey;
  displayName: string;
  identityFolio: string;
  status: LedgerStatus;
  outputReference?: string;
  remoteReference?: string;
  note: string;
}

export interface MetadataRow {
  key: ItemKey;
  metadata: ItemMetadata;
  outputFilename?: string;
  remoteReference?: string;
}

export type ItemOutcome =
  | { status: "success"; outputReference: string; remoteReference?: string }
  | { status: "confidential"; note: string }
  | { status: "error"; kind: ItemErrorKind; note: string }
  | { status: "skipped"; note: string };

export type ItemStateName =
  | "pending"
  | "trigger_opened"
  | "confidential"
  | "rendering"
  | "captured"
  | "capture_failed"
  | "closed";

export interface ItemResult {
  key: ItemKey;
  outcome: ItemOutcome;
  metadata: ItemMetadata;
  states: ItemStateName[];
}

export interface CapturedDocument {
  key: ItemKey;
  bytes: Buffer;
  remoteReference?: string;
}

export function formatItemKey(key: ItemKey): string {
  return `${key.pageNumber}:${key.rowIndex}`;
}

export function metadataValue(metadata: ItemMetadata, field: string): string {
  const match = metadata.find(([name]) => name === field);
  return match ? match[1] : "";
}

export function outcomeNote(outcome: ItemOutcome): string {
  return outcome.status === "success" ? "" : outcome.note;
}
