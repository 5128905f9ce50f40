import path from "node:path";

import { z } from "zod";

import { finalizePool } from "../curation/augment_merge";
import { createJsonlReadStats, readJsonlRecords } from "../io/jsonl";
import { writeIndexedPool } from "../io/corpus_tables";
import { createCorpusLogger, type CorpusLogger } from "../logging/corpus_logger";
import type { IndexedRow } from "../schemas/canonical_row";
import { collectPrimevulRows, createPrimevulCounters, type PrimevulCounters } from "../sources/primevul";
import { logPool, reportPool } from "./build_corpus";
import { validateConfig } from "./config";
import { toFailureArtifact } from "./errors";
import { persistFailedSummary, writeRunSummary, type RunSummary } from "./run_summary";

export const PrimevulConfigSchema = z.object({
  input: z.string().min(1),
  output: z.string().min(1),
});
export type PrimevulConfig = z.infer<typeof PrimevulConfigSchema>;

export function resolvePrimevulConfig(options: { input?: string; output?: string }): PrimevulConfig {
  return validateConfig(PrimevulConfigSchema, {
    input: options.input ? path.resolve(options.input) : undefined,
    output: options.output ? path.resolve(options.output) : undefined,
  });
}

export type ConvertPrimevulResult = {
  rows: IndexedRow[];
  counters: PrimevulCounters;
  summary: RunSummary;
  summary_path: string;
};

function resolveSummaryPath(output: string): string {
  const base = path.basename(output, path.extname(output));
  return path.join(path.dirname(output), `${base}_run_summary.json`);
}

/** Keeps plain C functions only; the output is indexed like any other corpus table. */
export function convertPrimevul(
  config: PrimevulConfig,
  logger: CorpusLogger = createCorpusLogger()
): ConvertPrimevulResult {
  const summaryPath = resolveSummaryPath(config.output);
  const summary: RunSummary = {
    version: "corpus_run_v1",
    command: "primevul",
    generated_at: new Date().toISOString(),
    status: "failed",
    config: { ...config },
    counters: {},
    pools: [],
    not_written: [],
    logs: logger.entries,
    failure: null,
  };

  try {
    const stats = createJsonlReadStats();
    const counters = createPrimevulCounters();
    const mapped = collectPrimevulRows(readJsonlRecords(config.input, stats, { stage: "primevul" }), counters);
    counters.total = stats.lines;
    counters.skip_malformed_json = stats.skip_malformed_json;
    summary.counters.primevul = counters;

    const rows = finalizePool(mapped);
    writeIndexedPool(config.output, rows);
    logger.counts("PrimeVul:", counters);
    const report = reportPool("PrimeVul", config.output, rows);
    summary.pools.push(report);
    logPool(logger, report);

    summary.status = "completed";
    writeRunSummary(summaryPath, summary);
    return { rows, counters, summary, summary_path: summaryPath };
  } catch (error) {
    summary.failure = toFailureArtifact(error, "primevul");
    logger.error(summary.failure.reason);
    persistFailedSummary(summaryPath, summary, logger);
    throw error;
  }
}
