import type { ListingItem, ListingSession } from "../automation/types";
import type { Clock } from "../core/timing";
import { systemClock, withTimeout } from "../core/timing";
import { errorMessage } from "../extract/errors";
import type { ItemHandler } from "../extract/itemProcessor";
import type { Ledger } from "../ledger";
import { emptyStatusCounts } from "../ledger";
import type { Logger, MetricsRegistry } from "../observability";
import type { OutcomeSink } from "../sink";
import type { ItemKey, ItemResult, LedgerStatus } from "../types";
import { outcomeNote } from "../types";
import { emptyMetadata } from "./rowParser";

export interface TraversalOptions {
  startPage: number;
  endPage?: number;
  itemDelayMs: number;
  pageDelayMs: number;
}

export interface RunSummary {
  startPage: number;
  endPage: number;
  pagesVisited: number;
  pagesSkipped: number;
  itemsSeen: number;
  byStatus: Record<LedgerStatus, number>;
}

interface CoordinatorDependencies {
  ledger: Ledger;
  processor: ItemHandler;
  sink: OutcomeSink;
  logger: Logger;
  metrics: MetricsRegistry;
  metadataFields: string[];
  pageSelectTimeoutMs: number;
  clock?: Clock;
}

const STATUS_COUNTERS = {
  success: "items_success",
  confidential: "items_confidential",
  error: "items_error",
  skipped: "items_skipped",
} as const;

/**
 * Walks pages `[startPage, endPage]` and every item on each page in order.
 * An exception escaping one item is recorded against that item and never
 * stops the traversal.
 */
export class PageTraversalCoordinator {
  private readonly deps: CoordinatorDependencies;
  private readonly clock: Clock;

  constructor(deps: CoordinatorDependencies) {
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
  }

  async run(session: ListingSession, options: TraversalOptions): Promise<RunSummary> {
    const { logger } = this.deps;
    const endPage = await this.resolveEndPage(session, options);
    const summary: RunSummary = {
      startPage: options.startPage,
      endPage,
      pagesVisited: 0,
      pagesSkipped: 0,
      itemsSeen: 0,
      byStatus: emptyStatusCounts(),
    };

    logger.info("traversal_start", { startPage: options.startPage, endPage });

    for (let page = options.startPage; page <= endPage; page += 1) {
      if (page > options.startPage) {
        await this.clock.sleep(options.pageDelayMs);
      }

      const items = await this.openPage(session, page);
      if (!items) {
        summary.pagesSkipped += 1;
        this.deps.metrics.incrementCounter("pages_skipped");
        continue;
      }

      logger.info("page_start", { page, items: items.length });
      const pageCounts = emptyStatusCounts();

      for (let rowIndex = 0; rowIndex < items.length; rowIndex += 1) {
        const result = await this.processItem(session, { pageNumber: page, rowIndex }, options.itemDelayMs);
        summary.itemsSeen += 1;
        summary.byStatus[result.outcome.status] += 1;
        pageCounts[result.outcome.status] += 1;
        this.deps.metrics.incrementCounter("items_seen");
        this.deps.metrics.incrementCounter(STATUS_COUNTERS[result.outcome.status]);
        await this.publish(result);

        logger.info("item_complete", {
          page,
          rowIndex,
          status: result.outcome.status,
          note: outcomeNote(result.outcome) || undefined,
          progress: `${rowIndex + 1}/${items.length}`,
        });
      }

      summary.pagesVisited += 1;
      this.deps.metrics.incrementCounter("pages_visited");
      logger.info("page_complete", { page, endPage, ...pageCounts });
    }

    logger.info("traversal_complete", { ...summary });
    return summary;
  }

  private async resolveEndPage(session: ListingSession, options: TraversalOptions): Promise<number> {
    if (options.endPage !== undefined) {
      return options.endPage;
    }

    let detected: number | undefined;
    try {
      detected = await withTimeout(session.detectTotalPages(), this.deps.pageSelectTimeoutMs, "detect_total_pages");
    } catch (error) {
      this.deps.logger.warn("page_total_detection_failed", { error: errorMessage(error) });
    }

    if (detected === undefined) {
      this.deps.logger.warn("page_total_unknown", { startPage: options.startPage });
      return options.startPage;
    }
    return detected;
  }

  /** Resolves the page's items, or undefined when the page could not be shown. */
  private async openPage(session: ListingSession, page: number): Promise<ListingItem[] | undefined> {
    const timeoutMs = this.deps.pageSelectTimeoutMs;
    const stopTimer = this.deps.metrics.startTimer("page_select_ms");
    try {
      const selected = await withTimeout(session.selectPage(page), timeoutMs, "select_page");
      if (!selected) {
        this.deps.logger.warn("page_select_failed", { page });
        return undefined;
      }
      return await withTimeout(session.enumerateItems(), timeoutMs, "enumerate_items");
    } catch (error) {
      this.deps.logger.warn("page_select_failed", { page, error: errorMessage(error) });
      return undefined;
    } finally {
      stopTimer();
    }
  }

  private async processItem(session: ListingSession, key: ItemKey, itemDelayMs: number): Promise<ItemResult> {
    try {
      return await this.deps.processor.process(session, key, { itemDelayMs });
    } catch (error) {
      const note = `unhandled:${errorMessage(error)}`;
      this.deps.logger.error("item_unhandled_error", { page: key.pageNumber, rowIndex: key.rowIndex, note });
      await this.recordUnhandled(key, note);
      return {
        key,
        outcome: { status: "error", kind: "Unhandled", note },
        metadata: [],
        states: ["pending", "closed"],
      };
    }
  }

  private async recordUnhandled(key: ItemKey, note: string): Promise<void> {
    const { ledger, logger } = this.deps;
    try {
      await ledger.record({ key, displayName: "", identityFolio: "", status: "error", note });
      await ledger.recordMetadata({ key, metadata: emptyMetadata(this.deps.metadataFields) });
    } catch (error) {
      logger.error("ledger_record_failed", { page: key.pageNumber, rowIndex: key.rowIndex, error: errorMessage(error) });
    }
  }

  private async publish(result: ItemResult): Promise<void> {
    try {
      await this.deps.sink.publishOutcomes([result]);
    } catch (error) {
      this.deps.logger.warn("outcome_publish_failed", {
        page: result.key.pageNumber,
        rowIndex: result.key.rowIndex,
        error: errorMessage(error),
      });
    }
  }
}
