import fs from "node:fs";
import path from "node:path";
import type { ItemResult } from "../types";
import type { OutcomeSink } from "./types";

export class LocalJsonlSink implements OutcomeSink {
  private readonly manifestPath: string;
  private readonly runId: string;

  constructor(manifestPath: string, runId: string) {
    this.manifestPath = path.resolve(manifestPath);
    fs.mkdirSync(path.dirname(this.manifestPath), { recursive: true });
    this.runId = runId;
  }

  async publishOutcomes(results: ItemResult[]): Promise<void> {
    if (results.length === 0) {
      return;
    }

    const publishedAt = new Date().toISOString();
    const content =
      results
        .map((result) =>
          JSON.stringify({
            runId: this.runId,
            publishedAt,
            page: result.key.pageNumber,
            rowIndex: result.key.rowIndex,
            ...result.outcome,
            metadata: Object.fromEntries(result.metadata),
            states: result.states,
          }),
        )
        .join("\n") + "\n";
    await fs.promises.appendFile(this.manifestPath, content, "utf-8");
  }
}

export class NoopSink implements OutcomeSink {
  async publishOutcomes(_results: ItemResult[]): Promise<void> {
    return;
  }
}
