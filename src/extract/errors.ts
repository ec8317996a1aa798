import type { ItemErrorKind, ItemOutcome } from "../types";

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Failure scoped to a single listing item. The note is what lands in the
 * ledger's `notes` column.
 */
export class ItemError extends Error {
  readonly kind: ItemErrorKind;
  readonly note: string;

  constructor(kind: ItemErrorKind, note: string, options?: { cause?: unknown }) {
    super(`${kind}: ${note}`, options);
    this.name = "ItemError";
    this.kind = kind;
    this.note = note;
  }

  toOutcome(): ItemOutcome {
    return { status: "error", kind: this.kind, note: this.note };
  }
}

export class LedgerWriteError extends ItemError {
  constructor(target: string, cause: unknown) {
    super("WriteFailed", `write_failed:${target}:${errorMessage(cause)}`, { cause });
    this.name = "LedgerWriteError";
  }
}

export class OperationTimeoutError extends Error {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "OperationTimeoutError";
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

export function toItemError(kind: ItemErrorKind, prefix: string, error: unknown): ItemError {
  if (error instanceof ItemError) {
    return error;
  }
  return new ItemError(kind, `${prefix}:${errorMessage(error)}`, { cause: error });
}
