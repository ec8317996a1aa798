export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  page?: number;
  rowIndex?: number;
  status?: string;
  note?: string;
  [key: string]: unknown;
}

export type LogWriter = (level: LogLevel, line: string) => void;

export type MetricCounterName =
  | "pages_visited"
  | "pages_skipped"
  | "items_seen"
  | "items_success"
  | "items_confidential"
  | "items_error"
  | "items_skipped";

export type MetricTimerName = "page_select_ms" | "item_ms" | "capture_ms";
