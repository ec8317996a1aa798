import type { AppConfig } from "../config";
import { LocalJsonlSink, NoopSink } from "./localJsonlSink";
import type { OutcomeSink } from "./types";

export function createSink(config: AppConfig, runId: string, dryRun = false): OutcomeSink {
  if (dryRun) {
    return new NoopSink();
  }

  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config.outputs.manifestPath, runId);
    case "none":
      return new NoopSink();
    default:
      throw new Error(`Unsupported sink type: ${String(config.sinkType)}`);
  }
}

export * from "./localJsonlSink";
export * from "./types";
