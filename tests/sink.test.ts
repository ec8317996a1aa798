import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DryRunLedger, InMemoryLedger } from "../src/ledger";
import { LocalJsonlSink } from "../src/sink";
import type { ItemResult, LedgerEntry } from "../src/types";
import { createTestLogger, loggedMessages } from "./helpers/fakes";

let workDir: string;

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), "sink-"));
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

describe("LocalJsonlSink", () => {
  it("appends one json line per outcome", async () => {
    const manifestPath = path.join(workDir, "manifests", "outcomes.jsonl");
    const sink = new LocalJsonlSink(manifestPath, "run-1");
    const result: ItemResult = {
      key: { pageNumber: 2, rowIndex: 5 },
      outcome: { status: "confidential", note: "record_confidential" },
      metadata: [
        ["folio_unico", "F-5"],
        ["nombre", "Ana"],
      ],
      states: ["pending", "trigger_opened", "confidential", "closed"],
    };

    await sink.publishOutcomes([result]);
    await sink.publishOutcomes([]);

    const lines = fs.readFileSync(manifestPath, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toEqual({
      runId: "run-1",
      publishedAt: expect.any(String),
      page: 2,
      rowIndex: 5,
      status: "confidential",
      note: "record_confidential",
      metadata: { folio_unico: "F-5", nombre: "Ana" },
      states: ["pending", "trigger_opened", "confidential", "closed"],
    });
  });
});

describe("DryRunLedger", () => {
  it("reads through to the wrapped ledger and drops appends", async () => {
    const done: LedgerEntry = {
      key: { pageNumber: 1, rowIndex: 0 },
      displayName: "Ana",
      identityFolio: "F-1",
      status: "success",
      outputReference: "docs/a.pdf",
      note: "",
    };
    const inner = new InMemoryLedger([done]);
    const { logger, lines } = createTestLogger();
    const ledger = new DryRunLedger(inner, logger);

    await ledger.record({ ...done, key: { pageNumber: 1, rowIndex: 1 } });
    await ledger.recordMetadata({ key: { pageNumber: 1, rowIndex: 1 }, metadata: [] });

    expect(await ledger.wasCompleted({ pageNumber: 1, rowIndex: 0 })).toBe(true);
    expect(await ledger.wasCompleted({ pageNumber: 1, rowIndex: 1 })).toBe(false);
    expect(inner.entries).toHaveLength(1);
    expect(inner.metadataRows).toHaveLength(0);
    expect(loggedMessages(lines)).toEqual(["ledger_record_dry_run", "metadata_record_dry_run"]);
  });
});
