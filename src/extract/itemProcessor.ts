import type { DetailSurface, DocumentRenderer, ListingItem, ListingSession } from "../automation/types";
import type { AppConfig, CaptureSettings, StabilizationSettings, TimeoutSettings } from "../config";
import type { Clock } from "../core/timing";
import { systemClock, withTimeout } from "../core/timing";
import { emptyMetadata, parseRowMetadata } from "../crawl/rowParser";
import type { Ledger } from "../ledger";
import type { Logger, MetricsRegistry } from "../observability";
import type {
  CapturedDocument,
  ItemKey,
  ItemMetadata,
  ItemOutcome,
  ItemResult,
  ItemStateName,
  LedgerEntry,
} from "../types";
import type { DocumentStore } from "./documentStore";
import { errorMessage, ItemError, toItemError } from "./errors";
import type { DocumentIdentity } from "./sanitize";
import { buildDocumentIdentity } from "./sanitize";
import { waitUntilStable } from "./stabilization";

/** Extra time granted to a capability that already enforces its own timeout. */
const CAPABILITY_GRACE_MS = 5_000;

export interface DocumentFetcher {
  fetchDocument(url: string): Promise<Buffer | undefined>;
}

export interface ItemProcessorSettings {
  listingUrl: string;
  verifyOutputOnResume: boolean;
  timeouts: TimeoutSettings;
  stabilization: StabilizationSettings;
  capture: CaptureSettings;
  metadataFields: string[];
  identityField: string;
  displayNameField: string;
}

export interface ItemProcessorDeps {
  ledger: Ledger;
  documents: DocumentStore;
  renderer: DocumentRenderer;
  remote?: DocumentFetcher;
  logger: Logger;
  metrics: MetricsRegistry;
  clock?: Clock;
  settings: ItemProcessorSettings;
}

export interface ProcessOptions {
  itemDelayMs: number;
}

export interface ItemHandler {
  process(session: ListingSession, key: ItemKey, options: ProcessOptions): Promise<ItemResult>;
}

export function processorSettingsFromConfig(config: AppConfig): ItemProcessorSettings {
  return {
    listingUrl: config.listingUrl,
    verifyOutputOnResume: config.verifyOutputOnResume,
    timeouts: config.timeouts,
    stabilization: config.stabilization,
    capture: config.capture,
    metadataFields: config.site.metadataFields,
    identityField: config.site.identityField,
    displayNameField: config.site.displayNameField,
  };
}

/**
 * Drives one listing item from `pending` to `closed`:
 *
 *   pending -> trigger_opened -> confidential                -> closed
 *                             -> rendering -> captured        -> closed
 *                                          -> capture_failed  -> closed
 *
 * Every non-skipped outcome is written to the ledger first and the metadata
 * row second, then the surface is closed and the inter-item delay applied.
 */
export class ItemProcessor implements ItemHandler {
  private readonly ledger: Ledger;
  private readonly documents: DocumentStore;
  private readonly renderer: DocumentRenderer;
  private readonly remote?: DocumentFetcher;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly clock: Clock;
  private readonly settings: ItemProcessorSettings;

  constructor(deps: ItemProcessorDeps) {
    this.ledger = deps.ledger;
    this.documents = deps.documents;
    this.renderer = deps.renderer;
    this.remote = deps.remote;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.clock = deps.clock ?? systemClock;
    this.settings = deps.settings;
  }

  async process(session: ListingSession, key: ItemKey, options: ProcessOptions): Promise<ItemResult> {
    const log = this.logger.child("item", { page: key.pageNumber, rowIndex: key.rowIndex });
    const states: ItemStateName[] = ["pending"];

    const skipNote = await this.resumeCheck(key, log);
    if (skipNote) {
      this.transition(states, "closed", log);
      return { key, outcome: { status: "skipped", note: skipNote }, metadata: [], states };
    }

    const stopTimer = this.metrics.startTimer("item_ms");
    let metadata = emptyMetadata(this.settings.metadataFields);
    let identity = this.identityOf(metadata);
    let surface: DetailSurface | null = null;
    let outcome: ItemOutcome;

    try {
      const item = await this.locateItem(session, key);
      metadata = await this.readMetadata(item, log);
      identity = this.identityOf(metadata);

      await this.activateTrigger(item);
      this.transition(states, "trigger_opened", log);

      surface = await this.probeRestricted(session, log);
      if (surface) {
        this.transition(states, "confidential", log);
        outcome = { status: "confidential", note: "record_confidential" };
      } else {
        surface = await this.awaitDetailSurface(session);
        this.transition(states, "rendering", log);
        outcome = await this.renderAndPersist(surface, key, identity, log);
        this.transition(states, "captured", log);
      }
    } catch (error) {
      if (states[states.length - 1] === "rendering") {
        this.transition(states, "capture_failed", log);
      }
      outcome = toItemError("Unhandled", "unhandled", error).toOutcome();
      log.warn("item_failed", { note: outcome.status === "error" ? outcome.note : undefined });
    }

    try {
      outcome = await this.finalize(key, identity, metadata, outcome, log);
    } finally {
      if (surface) {
        await this.closeSurface(surface, log);
      }
      this.transition(states, "closed", log);
      stopTimer();
      await this.clock.sleep(options.itemDelayMs);
    }

    return { key, outcome, metadata, states };
  }

  private async resumeCheck(key: ItemKey, log: Logger): Promise<string | undefined> {
    if (!(await this.ledger.wasCompleted(key))) {
      return undefined;
    }

    if (this.settings.verifyOutputOnResume) {
      const previous = await this.ledger.findSuccess(key);
      const reference = previous?.outputReference;
      if (reference && !(await this.documents.exists(reference))) {
        log.warn("item_output_missing_reprocessing", { outputReference: reference });
        return undefined;
      }
    }

    return "already_logged";
  }

  private async locateItem(session: ListingSession, key: ItemKey): Promise<ListingItem> {
    const items = await withTimeout(session.enumerateItems(), this.settings.timeouts.pageSelectMs, "enumerate_items");
    const item = items[key.rowIndex];
    if (!item) {
      throw new ItemError("IndexOutOfBounds", "row_index_out_of_bounds");
    }
    return item;
  }

  private async readMetadata(item: ListingItem, log: Logger): Promise<ItemMetadata> {
    try {
      return parseRowMetadata(await item.readRowHtml(), this.settings.metadataFields);
    } catch (error) {
      log.warn("row_metadata_unavailable", { error: errorMessage(error) });
      return emptyMetadata(this.settings.metadataFields);
    }
  }

  private async activateTrigger(item: ListingItem): Promise<void> {
    const timeoutMs = this.settings.timeouts.triggerMs;
    let activated: boolean;
    try {
      activated = await withTimeout(item.activateDetail(timeoutMs), timeoutMs + CAPABILITY_GRACE_MS, "activate_detail");
    } catch (error) {
      throw new ItemError("TriggerNotFound", "trigger_not_found", { cause: error });
    }
    if (!activated) {
      throw new ItemError("TriggerNotFound", "trigger_not_found");
    }
  }

  private async probeRestricted(session: ListingSession, log: Logger): Promise<DetailSurface | null> {
    const timeoutMs = this.settings.timeouts.restrictedProbeMs;
    try {
      return await withTimeout(session.waitForSurface("restricted", timeoutMs), timeoutMs + CAPABILITY_GRACE_MS, "restricted_probe");
    } catch (error) {
      log.warn("restricted_probe_failed", { error: errorMessage(error) });
      return null;
    }
  }

  private async awaitDetailSurface(session: ListingSession): Promise<DetailSurface> {
    const timeoutMs = this.settings.timeouts.surfaceMs;
    let surface: DetailSurface | null;
    try {
      surface = await withTimeout(session.waitForSurface("detail", timeoutMs), timeoutMs + CAPABILITY_GRACE_MS, "detail_surface");
    } catch (error) {
      throw new ItemError("SurfaceTimeout", "surface_timeout", { cause: error });
    }
    if (!surface) {
      throw new ItemError("SurfaceTimeout", "surface_timeout");
    }
    return surface;
  }

  private async renderAndPersist(
    surface: DetailSurface,
    key: ItemKey,
    identity: DocumentIdentity,
    log: Logger,
  ): Promise<ItemOutcome> {
    await this.awaitContent(surface, log);
    await this.fitLayout(surface, log);
    const document = await this.capture(surface, key, log);

    let outputReference: string;
    try {
      outputReference = await this.documents.save(identity.label, document.bytes);
    } catch (error) {
      throw toItemError("WriteFailed", "write_failed", error);
    }

    log.info("document_saved", { outputReference, bytes: document.bytes.length });
    return { status: "success", outputReference, remoteReference: document.remoteReference };
  }

  private async awaitContent(surface: DetailSurface, log: Logger): Promise<void> {
    const { stabilization, timeouts } = this.settings;
    try {
      const result = await waitUntilStable(
        () => withTimeout(surface.measureContent(), stabilization.timeoutMs, "measure_content"),
        stabilization,
        this.clock,
      );
      if (result.status === "timedOut") {
        log.warn("content_stabilization_timeout", { samples: result.samples, lastValue: result.lastValue });
      } else {
        log.debug("content_stabilized", { samples: result.samples, lastValue: result.lastValue });
      }
    } catch (error) {
      log.warn("content_measure_unavailable", { error: errorMessage(error), graceDelayMs: timeouts.graceDelayMs });
      await this.clock.sleep(timeouts.graceDelayMs);
    }
  }

  private async fitLayout(surface: DetailSurface, log: Logger): Promise<void> {
    try {
      await withTimeout(surface.fitToContent(), this.settings.timeouts.surfaceMs, "fit_to_content");
    } catch (error) {
      log.warn("layout_fit_failed", { error: errorMessage(error) });
    }
    await this.clock.sleep(this.settings.timeouts.layoutSettleMs);
  }

  private async capture(surface: DetailSurface, key: ItemKey, log: Logger): Promise<CapturedDocument> {
    const stopTimer = this.metrics.startTimer("capture_ms");
    const { capture, timeouts } = this.settings;
    try {
      const remote = await this.tryRemoteCapture(surface, key, log);
      if (remote) {
        return remote;
      }

      const html = await withTimeout(surface.snapshotHtml(), timeouts.captureMs, "snapshot_html");
      const bytes = await withTimeout(
        this.renderer.renderSnapshot(html, {
          pageFormat: capture.pageFormat,
          margins: capture.margins,
          widthPx: capture.snapshotWidthPx,
          baseUrl: this.settings.listingUrl,
        }),
        timeouts.captureMs,
        "render_snapshot",
      );
      if (bytes.length === 0) {
        throw new ItemError("CaptureFailed", "no_document_bytes");
      }
      return { key, bytes };
    } catch (error) {
      throw toItemError("CaptureFailed", "capture_failed", error);
    } finally {
      stopTimer();
    }
  }

  private async tryRemoteCapture(surface: DetailSurface, key: ItemKey, log: Logger): Promise<CapturedDocument | undefined> {
    if (this.settings.capture.strategy !== "remote_first" || !this.remote) {
      return undefined;
    }

    let link: string | undefined;
    try {
      link = await withTimeout(surface.findDocumentLink(), this.settings.timeouts.surfaceMs, "find_document_link");
    } catch (error) {
      log.warn("document_link_unavailable", { error: errorMessage(error) });
      return undefined;
    }
    if (!link) {
      return undefined;
    }

    const url = new URL(link, this.settings.listingUrl).toString();
    try {
      const bytes = await this.remote.fetchDocument(url);
      if (bytes && bytes.length > 0) {
        return { key, bytes, remoteReference: url };
      }
      log.warn("remote_document_empty", { url });
    } catch (error) {
      log.warn("remote_document_failed", { url, error: errorMessage(error) });
    }
    return undefined;
  }

  private async finalize(
    key: ItemKey,
    identity: DocumentIdentity,
    metadata: ItemMetadata,
    outcome: ItemOutcome,
    log: Logger,
  ): Promise<ItemOutcome> {
    let finalOutcome = outcome;
    try {
      await this.ledger.record(this.entryFor(key, identity, outcome));
    } catch (error) {
      finalOutcome = toItemError("WriteFailed", "write_failed", error).toOutcome();
      log.error("ledger_record_failed", { error: errorMessage(error), status: outcome.status });
      await this.ledger.record(this.entryFor(key, identity, finalOutcome));
    }

    // The outcome is already in the ledger; a lost metadata row must not change it.
    try {
      await this.ledger.recordMetadata({
        key,
        metadata,
        outputFilename: finalOutcome.status === "success" ? finalOutcome.outputReference : undefined,
        remoteReference: finalOutcome.status === "success" ? finalOutcome.remoteReference : undefined,
      });
    } catch (error) {
      log.error("metadata_record_failed", { error: errorMessage(error), status: finalOutcome.status });
    }
    return finalOutcome;
  }

  private entryFor(key: ItemKey, identity: DocumentIdentity, outcome: ItemOutcome): LedgerEntry {
    const base = { key, displayName: identity.displayName || "unknown", identityFolio: identity.identityFolio };
    if (outcome.status === "success") {
      return {
        ...base,
        status: "success",
        outputReference: outcome.outputReference,
        remoteReference: outcome.remoteReference,
        note: "",
      };
    }
    return { ...base, status: outcome.status, note: outcome.note };
  }

  private async closeSurface(surface: DetailSurface, log: Logger): Promise<void> {
    try {
      await withTimeout(surface.close(), this.settings.timeouts.triggerMs, "close_surface");
    } catch (error) {
      log.debug("surface_close_failed", { kind: surface.kind, error: errorMessage(error) });
    }
  }

  private identityOf(metadata: ItemMetadata): DocumentIdentity {
    return buildDocumentIdentity(
      metadata,
      { displayNameField: this.settings.displayNameField, identityField: this.settings.identityField },
      this.settings.capture.maxFilenameLength,
    );
  }

  private transition(states: ItemStateName[], next: ItemStateName, log: Logger): void {
    const from = states[states.length - 1];
    states.push(next);
    log.debug("item_transition", { from, to: next });
  }
}
