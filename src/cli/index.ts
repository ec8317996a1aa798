import { loadConfig } from "../config";
import { runExtraction, runStatus, runVerify } from "../core/commands";
import type { AutomationLauncher } from "../core/commands";
import { secondsToMs } from "../core/timing";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../observability";
import type { LogWriter } from "../observability";

export type CommandName = "run" | "status" | "verify";

export interface ParsedCliArgs {
  command: CommandName;
  startPage: number;
  endPage?: number;
  headed: boolean;
  dryRun: boolean;
  ignoreHttpsErrors: boolean;
  itemDelayMs?: number;
  pageDelayMs?: number;
  configPath?: string;
}

export interface CliRuntime {
  env?: NodeJS.ProcessEnv;
  launchAutomation?: AutomationLauncher;
  writer?: LogWriter;
  print?: (line: string) => void;
}

const HELP_TEXT = `
Usage:
  listing-extractor <command> [options]

Commands:
  run      Walk the listing and capture one document per item
  status   Print ledger statistics
  verify   List successful items whose document is missing on disk

Options:
  --start-page <n>       First page to process (default 1)
  --end-page <n>         Last page to process (default: detected page count)
  --headed               Show the browser window
  --dry-run              Capture nothing to disk; log what would be recorded
  --item-delay <s>       Seconds to wait after each item (default 0.12)
  --page-delay <s>       Seconds to wait between pages (default 0.5)
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  --config <path>        Optional path to JSON config file
  -h, --help             Show this help
`;

export class CliUsageError extends Error {}

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "run" || raw === "status" || raw === "verify") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`Missing value for ${flag}`);
  }
  return value;
}

function pageOption(argv: string[], flag: string): number | undefined {
  const raw = optionValue(argv, flag);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!/^\d+$/.test(raw) || parsed < 1) {
    throw new CliUsageError(`${flag} expects a positive integer, got "${raw}"`);
  }
  return parsed;
}

function delayOption(argv: string[], flag: string): number | undefined {
  const raw = optionValue(argv, flag);
  if (raw === undefined) {
    return undefined;
  }
  const seconds = Number.parseFloat(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new CliUsageError(`${flag} expects a non-negative number of seconds, got "${raw}"`);
  }
  return secondsToMs(seconds);
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const startPage = pageOption(argv, "--start-page") ?? 1;
  const endPage = pageOption(argv, "--end-page");
  if (endPage !== undefined && endPage < startPage) {
    throw new CliUsageError(`--end-page (${endPage}) is before --start-page (${startPage})`);
  }

  return {
    command,
    startPage,
    endPage,
    headed: argv.includes("--headed"),
    dryRun: argv.includes("--dry-run"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    itemDelayMs: delayOption(argv, "--item-delay"),
    pageDelayMs: delayOption(argv, "--page-delay"),
    configPath: optionValue(argv, "--config"),
  };
}

export async function runCli(argv: string[], runtime: CliRuntime = {}): Promise<number> {
  const print = runtime.print ?? console.log;
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    print(HELP_TEXT.trim());
    return 0;
  }

  const env = runtime.env ?? process.env;
  let config = loadConfig(parsed.configPath, env);
  if (parsed.headed) {
    config = { ...config, headless: false };
  }
  if (parsed.ignoreHttpsErrors) {
    config = { ...config, ignoreHttpsErrors: true };
  }

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger(
    { component: "cli", runId },
    { minLevel: parseLogLevel(env.LOG_LEVEL, "info"), writer: runtime.writer },
  );
  const context = { runId, config, metrics, launchAutomation: runtime.launchAutomation };

  logger.info("command_start", {
    command: parsed.command,
    dryRun: parsed.dryRun,
    headless: config.headless,
    startPage: parsed.startPage,
    endPage: parsed.endPage,
  });

  try {
    switch (parsed.command) {
      case "run":
        await runExtraction(
          { ...context, logger: logger.child("extract") },
          {
            startPage: parsed.startPage,
            endPage: parsed.endPage,
            itemDelayMs: parsed.itemDelayMs ?? config.itemDelayMs,
            pageDelayMs: parsed.pageDelayMs ?? config.pageDelayMs,
            dryRun: parsed.dryRun,
          },
        );
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
      case "verify": {
        const report = await runVerify({ ...context, logger: logger.child("verify") });
        if (report.missing.length > 0) {
          logger.info("command_complete", { command: parsed.command, missing: report.missing.length });
          return 1;
        }
        break;
      }
      default:
        print(`Unsupported command: ${String(parsed.command)}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    metrics.printSummary(print);
  }
}
