import type { ItemResult } from "../types";

export interface OutcomeSink {
  publishOutcomes(results: ItemResult[]): Promise<void>;
}
