import type { LogFields, LogLevel, LogWriter } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
  bindings?: LogFields;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function consoleWriter(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  writer?: LogWriter;
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly minLevel: LogLevel;
  private readonly writer: LogWriter;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.minLevel = options.minLevel ?? "debug";
    this.writer = options.writer ?? consoleWriter;
  }

  child(component: string, bindings?: LogFields): Logger {
    return new Logger(
      {
        component,
        runId: this.context.runId,
        bindings: { ...(this.context.bindings ?? {}), ...(bindings ?? {}) },
      },
      { minLevel: this.minLevel, writer: this.writer },
    );
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(this.context.bindings ?? {}),
      ...(fields ?? {}),
    };

    this.writer(level, JSON.stringify(payload));
  }
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return fallback;
}
