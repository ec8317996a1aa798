const NEEDS_QUOTING = /[",\r\n]/;

export function encodeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function encodeCsvRow(values: ReadonlyArray<string | number>): string {
  return values.map((value) => encodeCsvField(String(value))).join(",") + "\r\n";
}

export interface CsvScan {
  rows: string[][];
  /** Offset just past the last record terminator read outside quotes. */
  boundary: number;
  /** True when the text ends inside an unterminated quoted field. */
  openQuote: boolean;
}

export function scanCsv(text: string): CsvScan {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let fieldStarted = false;
  let boundary = 0;

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && !fieldStarted) {
      inQuotes = true;
      fieldStarted = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
      fieldStarted = false;
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") {
        i += 1;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      fieldStarted = false;
      boundary = i + 1;
    } else {
      field += char;
      fieldStarted = true;
    }
  }

  if (fieldStarted || field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return { rows, boundary, openQuote: inQuotes };
}

/**
 * RFC 4180 reader. A trailing unterminated quoted field (a row cut short by
 * a crash) is returned as-is; callers drop rows that do not validate.
 */
export function parseCsv(text: string): string[][] {
  return scanCsv(text).rows;
}

/** Drops a final row torn inside a quoted field; an unquoted partial row is kept. */
export function withoutTornQuotedTail(text: string): string {
  const scan = scanCsv(text);
  return scan.openQuote ? text.slice(0, scan.boundary) : text;
}
