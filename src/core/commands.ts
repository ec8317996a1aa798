import { launchListingAutomation, RemoteDocumentFetcher } from "../automation";
import type { ListingAutomation } from "../automation";
import type { AppConfig } from "../config";
import { PageTraversalCoordinator } from "../crawl";
import type { RunSummary } from "../crawl";
import { DryRunDocumentStore, FileDocumentStore } from "../extract/documentStore";
import { errorMessage } from "../extract/errors";
import { ItemProcessor, processorSettingsFromConfig } from "../extract/itemProcessor";
import { createLedger, DryRunLedger } from "../ledger";
import type { LedgerStats } from "../ledger";
import type { Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import type { LedgerEntry } from "../types";
import { formatItemKey } from "../types";
import type { Clock } from "./timing";

export type AutomationLauncher = (config: AppConfig, logger: Logger) => Promise<ListingAutomation>;

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  launchAutomation?: AutomationLauncher;
  clock?: Clock;
}

export interface ExtractionOptions {
  startPage: number;
  endPage?: number;
  itemDelayMs: number;
  pageDelayMs: number;
  dryRun: boolean;
}

export interface VerifyReport {
  checked: number;
  missing: LedgerEntry[];
}

/**
 * Runs one extraction pass. Only a failure to launch the browser or open the
 * listing aborts the run; the browser and ledger are released on every path.
 */
export async function runExtraction(ctx: CommandContext, options: ExtractionOptions): Promise<RunSummary> {
  const { config, logger, metrics } = ctx;
  const ledger = createLedger(config, { readOnly: options.dryRun });
  const activeLedger = options.dryRun ? new DryRunLedger(ledger, logger.child("ledger")) : ledger;
  const documents = options.dryRun
    ? new DryRunDocumentStore(config.outputs.documentsDir)
    : new FileDocumentStore(config.outputs.documentsDir);
  const sink = createSink(config, ctx.runId, options.dryRun);
  const launch = ctx.launchAutomation ?? launchListingAutomation;

  logger.info("extraction_start", {
    listingUrl: config.listingUrl,
    startPage: options.startPage,
    endPage: options.endPage,
    dryRun: options.dryRun,
    ledgerBackend: config.ledgerBackend,
    captureStrategy: config.capture.strategy,
  });

  const remote =
    config.capture.strategy === "remote_first"
      ? new RemoteDocumentFetcher({
          timeoutMs: config.timeouts.captureMs,
          ignoreHttpsErrors: config.ignoreHttpsErrors,
          referer: config.listingUrl,
        })
      : undefined;

  let automation: ListingAutomation | undefined;
  try {
    automation = await launch(config, logger);
    const session = await automation.openListing(config.listingUrl);

    const processor = new ItemProcessor({
      ledger: activeLedger,
      documents,
      renderer: automation.renderer,
      remote,
      logger,
      metrics,
      clock: ctx.clock,
      settings: processorSettingsFromConfig(config),
    });

    const coordinator = new PageTraversalCoordinator({
      ledger: activeLedger,
      processor,
      sink,
      logger: logger.child("traversal"),
      metrics,
      metadataFields: config.site.metadataFields,
      pageSelectTimeoutMs: config.timeouts.pageSelectMs,
      clock: ctx.clock,
    });

    const summary = await coordinator.run(session, {
      startPage: options.startPage,
      endPage: options.endPage,
      itemDelayMs: options.itemDelayMs,
      pageDelayMs: options.pageDelayMs,
    });
    logger.info("extraction_complete", { ...summary });
    return summary;
  } finally {
    if (automation) {
      try {
        await automation.close();
      } catch (error) {
        logger.warn("automation_close_failed", { error: errorMessage(error) });
      }
    }
    await activeLedger.close();
    await remote?.close();
  }
}

export async function runStatus(ctx: CommandContext): Promise<LedgerStats> {
  ctx.logger.info("status_start", { ledgerBackend: ctx.config.ledgerBackend });
  const ledger = createLedger(ctx.config, { readOnly: true });
  try {
    const stats = await ledger.getStats();
    ctx.logger.info("status_complete", { stats });
    return stats;
  } finally {
    await ledger.close();
  }
}

/** Reports `success` entries whose document is no longer on disk. Only the latest success per key counts. */
export async function runVerify(ctx: CommandContext): Promise<VerifyReport> {
  ctx.logger.info("verify_start", { documentsDir: ctx.config.outputs.documentsDir });
  const ledger = createLedger(ctx.config, { readOnly: true });
  const documents = new FileDocumentStore(ctx.config.outputs.documentsDir);

  try {
    const latest = new Map<string, LedgerEntry>();
    for (const entry of await ledger.listEntries()) {
      if (entry.status === "success") {
        latest.set(formatItemKey(entry.key), entry);
      }
    }

    const missing: LedgerEntry[] = [];
    for (const entry of latest.values()) {
      if (!entry.outputReference || !(await documents.exists(entry.outputReference))) {
        missing.push(entry);
        ctx.logger.warn("verify_document_missing", {
          page: entry.key.pageNumber,
          rowIndex: entry.key.rowIndex,
          outputReference: entry.outputReference,
        });
      }
    }

    ctx.logger.info("verify_complete", { checked: latest.size, missing: missing.length });
    return { checked: latest.size, missing };
  } finally {
    await ledger.close();
  }
}
