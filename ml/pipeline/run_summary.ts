import fs from "node:fs";
import path from "node:path";

import type { LabelDistribution } from "../curation/label_stats";
import type { CorpusLogEntry, CorpusLogger } from "../logging/corpus_logger";
import type { CorpusFailureArtifact } from "./errors";

export type PoolReport = {
  name: string;
  path: string | null;
  rows: number;
  label_dist: LabelDistribution;
};

export type RunSummary = {
  version: "corpus_run_v1";
  command: "transform" | "augment" | "build" | "primevul";
  generated_at: string;
  status: "completed" | "failed";
  config: Record<string, unknown>;
  counters: Record<string, Record<string, number>>;
  pools: PoolReport[];
  not_written: string[];
  logs: CorpusLogEntry[];
  failure: CorpusFailureArtifact | null;
};

export function writeRunSummary(summaryPath: string, summary: RunSummary): string {
  fs.mkdirSync(path.dirname(summaryPath), { recursive: true });
  fs.writeFileSync(summaryPath, `${JSON.stringify(summary, null, 2)}\n`);
  return summaryPath;
}

/** Never throws; a failed write is logged so the run's own error still surfaces. */
export function persistFailedSummary(summaryPath: string, summary: RunSummary, logger: CorpusLogger): void {
  try {
    writeRunSummary(summaryPath, summary);
  } catch (error) {
    logger.error(`Could not write ${summaryPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}
