import { describe, expect, it, vi } from "vitest";
import type { DocumentFetcher, ItemProcessorSettings } from "../src/extract/itemProcessor";
import { ItemProcessor } from "../src/extract/itemProcessor";
import { LedgerWriteError } from "../src/extract/errors";
import { InMemoryLedger } from "../src/ledger";
import { MetricsRegistry } from "../src/observability";
import type { LedgerEntry } from "../src/types";
import {
  createTestLogger,
  FakeClock,
  FakeListingSession,
  FakeRenderer,
  loggedMessages,
  MemoryDocumentStore,
  row,
} from "./helpers/fakes";
import type { FakeRow } from "./helpers/fakes";
import { testSettings } from "./helpers/settings";

interface SetupOptions {
  settings?: Partial<ItemProcessorSettings>;
  ledger?: InMemoryLedger;
  remote?: DocumentFetcher;
}

function setup(options: SetupOptions = {}) {
  const ledger = options.ledger ?? new InMemoryLedger();
  const documents = new MemoryDocumentStore();
  const renderer = new FakeRenderer();
  const clock = new FakeClock();
  const metrics = new MetricsRegistry(() => clock.now());
  const { logger, lines } = createTestLogger();
  const processor = new ItemProcessor({
    ledger,
    documents,
    renderer,
    remote: options.remote,
    logger,
    metrics,
    clock,
    settings: testSettings(options.settings),
  });
  return { processor, ledger, documents, renderer, clock, metrics, lines };
}

function singleRow(source: FakeRow): FakeListingSession {
  return new FakeListingSession({ 1: [source] });
}

const FIRST = { pageNumber: 1, rowIndex: 0 };
const PACING = { itemDelayMs: 120 };

describe("ItemProcessor", () => {
  it("captures a normal item and records ledger entry then metadata row", async () => {
    const { processor, ledger, documents, renderer, clock } = setup();
    const session = singleRow(row("F-001", "Ana"));

    const result = await processor.process(session, FIRST, PACING);

    expect(result.outcome).toEqual({ status: "success", outputReference: "docs/Ana_F-001.pdf" });
    expect(result.states).toEqual(["pending", "trigger_opened", "rendering", "captured", "closed"]);
    expect(ledger.entries).toEqual([
      {
        key: FIRST,
        displayName: "Ana",
        identityFolio: "F-001",
        status: "success",
        outputReference: "docs/Ana_F-001.pdf",
        note: "",
      },
    ]);
    expect(ledger.metadataRows).toHaveLength(1);
    expect(ledger.metadataRows[0].metadata).toEqual([
      ["folio_unico", "F-001"],
      ["nombre", "Ana"],
      ["primer_apellido", "Lopez"],
      ["segundo_apellido", "Ruiz"],
      ["edad_actual", "30"],
    ]);
    expect(ledger.metadataRows[0].outputFilename).toBe("docs/Ana_F-001.pdf");
    expect(documents.saved.get("docs/Ana_F-001.pdf")?.toString()).toBe("%PDF-1.4 snapshot");
    expect(renderer.calls).toHaveLength(1);
    expect(renderer.calls[0].options.baseUrl).toBe("https://listing.test/consulta");
    expect(renderer.calls[0].options.widthPx).toBe(800);
    expect(session.closedSurfaces).toBe(1);
    // three stabilization samples, layout settle, item pacing
    expect(clock.sleeps).toEqual([300, 300, 300, 3000, 120]);
  });

  it("skips an item the ledger already completed without side effects", async () => {
    const done: LedgerEntry = {
      key: FIRST,
      displayName: "Ana",
      identityFolio: "F-001",
      status: "success",
      outputReference: "docs/Ana_F-001.pdf",
      note: "",
    };
    const { processor, ledger, documents, renderer, clock } = setup({ ledger: new InMemoryLedger([done]) });
    documents.saved.set("docs/Ana_F-001.pdf", Buffer.from("%PDF-old"));
    const session = singleRow(row("F-001", "Ana"));

    const result = await processor.process(session, FIRST, PACING);

    expect(result.outcome).toEqual({ status: "skipped", note: "already_logged" });
    expect(result.states).toEqual(["pending", "closed"]);
    expect(result.metadata).toEqual([]);
    expect(session.activations).toBe(0);
    expect(renderer.calls).toHaveLength(0);
    expect(ledger.entries).toHaveLength(1);
    expect(ledger.metadataRows).toHaveLength(0);
    expect(documents.saved.get("docs/Ana_F-001.pdf")?.toString()).toBe("%PDF-old");
    expect(clock.sleeps).toEqual([]);
  });

  it("reprocesses a completed item whose document is gone", async () => {
    const done: LedgerEntry = {
      key: FIRST,
      displayName: "Ana",
      identityFolio: "F-001",
      status: "success",
      outputReference: "docs/Ana_F-001.pdf",
      note: "",
    };
    const { processor, ledger, lines } = setup({ ledger: new InMemoryLedger([done]) });

    const result = await processor.process(singleRow(row("F-001", "Ana")), FIRST, PACING);

    expect(result.outcome.status).toBe("success");
    expect(ledger.entries).toHaveLength(2);
    expect(loggedMessages(lines)).toContain("item_output_missing_reprocessing");
  });

  it("trusts the ledger alone when output verification is off", async () => {
    const done: LedgerEntry = {
      key: FIRST,
      displayName: "Ana",
      identityFolio: "F-001",
      status: "success",
      outputReference: "docs/Ana_F-001.pdf",
      note: "",
    };
    const { processor } = setup({ ledger: new InMemoryLedger([done]), settings: { verifyOutputOnResume: false } });

    const result = await processor.process(singleRow(row("F-001", "Ana")), FIRST, PACING);

    expect(result.outcome).toEqual({ status: "skipped", note: "already_logged" });
  });

  it("classifies a restricted surface as confidential", async () => {
    const { processor, ledger, documents, renderer } = setup();
    const session = singleRow(row("F-002", "Bruno", { surface: "restricted" }));

    const result = await processor.process(session, FIRST, PACING);

    expect(result.outcome).toEqual({ status: "confidential", note: "record_confidential" });
    expect(result.states).toEqual(["pending", "trigger_opened", "confidential", "closed"]);
    expect(ledger.entries.map((entry) => [entry.status, entry.note])).toEqual([["confidential", "record_confidential"]]);
    expect(ledger.metadataRows).toHaveLength(1);
    expect(ledger.metadataRows[0].outputFilename).toBeUndefined();
    expect(ledger.metadataRows[0].remoteReference).toBeUndefined();
    expect(documents.saved.size).toBe(0);
    expect(renderer.calls).toHaveLength(0);
    expect(session.closedSurfaces).toBe(1);
  });

  it("records TriggerNotFound when the row has no trigger", async () => {
    const { processor, ledger } = setup();

    const result = await processor.process(singleRow(row("F-003", "Carla", { trigger: "missing" })), FIRST, PACING);

    expect(result.outcome).toEqual({ status: "error", kind: "TriggerNotFound", note: "trigger_not_found" });
    expect(result.states).toEqual(["pending", "closed"]);
    expect(ledger.metadataRows[0].metadata[0]).toEqual(["folio_unico", "F-003"]);
  });

  it("records TriggerNotFound when clicking the trigger throws", async () => {
    const { processor } = setup();

    const result = await processor.process(singleRow(row("F-003", "Carla", { trigger: "throws" })), FIRST, PACING);

    expect(result.outcome).toEqual({ status: "error", kind: "TriggerNotFound", note: "trigger_not_found" });
  });

  it("records SurfaceTimeout when no surface appears", async () => {
    const { processor, ledger } = setup();
    const session = singleRow(row("F-004", "Dario", { surface: "none" }));

    const result = await processor.process(session, FIRST, PACING);

    expect(result.outcome).toEqual({ status: "error", kind: "SurfaceTimeout", note: "surface_timeout" });
    expect(result.states).toEqual(["pending", "trigger_opened", "closed"]);
    expect(ledger.entries[0].status).toBe("error");
    expect(session.closedSurfaces).toBe(0);
  });

  it("records CaptureFailed when rendering throws and still closes the surface", async () => {
    const { processor, ledger } = setup();
    const session = singleRow(row("F-005", "Elena", { render: "throw" }));

    const result = await processor.process(session, FIRST, PACING);

    expect(result.outcome).toEqual({ status: "error", kind: "CaptureFailed", note: "capture_failed:page crashed" });
    expect(result.states).toEqual(["pending", "trigger_opened", "rendering", "capture_failed", "closed"]);
    expect(ledger.entries[0].note).toBe("capture_failed:page crashed");
    expect(ledger.metadataRows).toHaveLength(1);
    expect(session.closedSurfaces).toBe(1);
  });

  it("treats empty document bytes as a capture failure", async () => {
    const { processor, documents } = setup();

    const result = await processor.process(singleRow(row("F-006", "Fabio", { render: "empty" })), FIRST, PACING);

    expect(result.outcome).toEqual({ status: "error", kind: "CaptureFailed", note: "no_document_bytes" });
    expect(documents.saved.size).toBe(0);
  });

  it("records WriteFailed when the document cannot be persisted", async () => {
    const { processor, documents } = setup();
    documents.failWith = new Error("disk full");

    const result = await processor.process(singleRow(row("F-007", "Gina")), FIRST, PACING);

    expect(result.outcome).toEqual({ status: "error", kind: "WriteFailed", note: "write_failed:disk full" });
    expect(result.states).toEqual(["pending", "trigger_opened", "rendering", "capture_failed", "closed"]);
  });

  it("records IndexOutOfBounds with empty metadata when the row vanished", async () => {
    const { processor, ledger } = setup();

    const result = await processor.process(singleRow(row("F-008", "Hugo")), { pageNumber: 1, rowIndex: 4 }, PACING);

    expect(result.outcome).toEqual({ status: "error", kind: "IndexOutOfBounds", note: "row_index_out_of_bounds" });
    expect(ledger.entries[0]).toEqual({
      key: { pageNumber: 1, rowIndex: 4 },
      displayName: "unknown",
      identityFolio: "",
      status: "error",
      note: "row_index_out_of_bounds",
    });
    expect(ledger.metadataRows[0].metadata.every(([, value]) => value === "")).toBe(true);
  });

  it("falls back to the grace delay when content cannot be measured", async () => {
    const { processor, clock, lines } = setup();

    const result = await processor.process(singleRow(row("F-009", "Ines", { measureThrows: true })), FIRST, PACING);

    expect(result.outcome.status).toBe("success");
    expect(clock.sleeps).toEqual([4000, 3000, 120]);
    expect(loggedMessages(lines)).toContain("content_measure_unavailable");
  });

  it("proceeds best-effort when content never stabilizes", async () => {
    const heights = Array.from({ length: 200 }, (_, index) => index);
    const { processor, lines } = setup({
      settings: { stabilization: { sampleIntervalMs: 300, requiredStableSamples: 3, timeoutMs: 900 } },
    });

    const result = await processor.process(singleRow(row("F-010", "Jon", { heights })), FIRST, PACING);

    expect(result.outcome.status).toBe("success");
    expect(loggedMessages(lines)).toContain("content_stabilization_timeout");
  });

  it("keeps going when fitting the layout or closing the surface fails", async () => {
    const { processor, lines } = setup();
    const session = singleRow(row("F-011", "Karla", { fitThrows: true, closeThrows: true }));

    const result = await processor.process(session, FIRST, PACING);

    expect(result.outcome.status).toBe("success");
    expect(result.states[result.states.length - 1]).toBe("closed");
    expect(loggedMessages(lines)).toEqual(expect.arrayContaining(["layout_fit_failed", "surface_close_failed"]));
  });

  it("records the outcome as WriteFailed when the ledger append fails", async () => {
    class FlakyLedger extends InMemoryLedger {
      failures = 1;

      async record(entry: LedgerEntry): Promise<void> {
        if (this.failures > 0) {
          this.failures -= 1;
          throw new LedgerWriteError("ledger", new Error("disk full"));
        }
        await super.record(entry);
      }
    }
    const { processor, ledger } = setup({ ledger: new FlakyLedger() });

    const result = await processor.process(singleRow(row("F-012", "Luis")), FIRST, PACING);

    expect(result.outcome).toEqual({ status: "error", kind: "WriteFailed", note: "write_failed:ledger:disk full" });
    expect(ledger.entries.map((entry) => entry.status)).toEqual(["error"]);
    expect(ledger.metadataRows[0].outputFilename).toBeUndefined();
  });

  it("keeps the recorded outcome when the metadata row cannot be written", async () => {
    class MetadataFailingLedger extends InMemoryLedger {
      async recordMetadata(): Promise<void> {
        throw new LedgerWriteError("metadata", new Error("disk full"));
      }
    }
    const { processor, ledger, lines } = setup({ ledger: new MetadataFailingLedger() });

    const result = await processor.process(singleRow(row("F-014", "Olga")), FIRST, PACING);

    expect(result.outcome).toEqual({ status: "success", outputReference: "docs/Olga_F-014.pdf" });
    expect(ledger.entries.map((entry) => entry.status)).toEqual(["success"]);
    expect(loggedMessages(lines)).toContain("metadata_record_failed");
  });

  describe("remote_first capture", () => {
    const remoteSettings = { capture: { ...testSettings().capture, strategy: "remote_first" as const } };

    it("stores the fetched document and its resolved url", async () => {
      const remote = { fetchDocument: vi.fn(async (_url: string) => Buffer.from("%PDF-remote")) };
      const { processor, documents, renderer, ledger } = setup({ settings: remoteSettings, remote });

      const result = await processor.process(singleRow(row("F-013", "Mara", { link: "/api/pdf/77" })), FIRST, PACING);

      expect(remote.fetchDocument).toHaveBeenCalledWith("https://listing.test/api/pdf/77");
      expect(result.outcome).toEqual({
        status: "success",
        outputReference: "docs/Mara_F-013.pdf",
        remoteReference: "https://listing.test/api/pdf/77",
      });
      expect(renderer.calls).toHaveLength(0);
      expect(documents.saved.get("docs/Mara_F-013.pdf")?.toString()).toBe("%PDF-remote");
      expect(ledger.metadataRows[0].remoteReference).toBe("https://listing.test/api/pdf/77");
    });

    it("falls back to the snapshot when the remote answer holds no document", async () => {
      const remote = { fetchDocument: vi.fn(async (_url: string) => undefined) };
      const { processor, renderer } = setup({ settings: remoteSettings, remote });

      const result = await processor.process(singleRow(row("F-014", "Nico", { link: "/api/pdf/78" })), FIRST, PACING);

      expect(result.outcome).toEqual({ status: "success", outputReference: "docs/Nico_F-014.pdf" });
      expect(renderer.calls).toHaveLength(1);
    });

    it("falls back to the snapshot when the fetch throws", async () => {
      const remote = {
        fetchDocument: vi.fn(async (_url: string): Promise<Buffer | undefined> => {
          throw new Error("connection reset");
        }),
      };
      const { processor, renderer, lines } = setup({ settings: remoteSettings, remote });

      const result = await processor.process(singleRow(row("F-015", "Olga", { link: "/api/pdf/79" })), FIRST, PACING);

      expect(result.outcome.status).toBe("success");
      expect(renderer.calls).toHaveLength(1);
      expect(loggedMessages(lines)).toContain("remote_document_failed");
    });
  });
});
