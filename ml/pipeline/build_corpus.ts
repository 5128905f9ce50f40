import { mergeAugmented } from "../curation/augment_merge";
import { countSharedFingerprints } from "../curation/dedupe";
import { formatDistribution, labelDistribution } from "../curation/label_stats";
import { assertIndexedPool, writeIndexedPool } from "../io/corpus_tables";
import { createCorpusLogger, type CorpusLogger } from "../logging/corpus_logger";
import type { CanonicalRow, IndexedRow } from "../schemas/canonical_row";
import type { PipelineConfig } from "./config";
import { toFailureArtifact } from "./errors";
import { resolveAugmentedTrainPath, resolveRunSummaryPath, resolveSplitPath } from "./paths";
import { persistFailedSummary, writeRunSummary, type PoolReport, type RunSummary } from "./run_summary";
import { loadPrimaryPools, prepareSyntheticPool } from "./stages";

export type BuildCorpusResult = {
  train: IndexedRow[];
  val: IndexedRow[];
  test: IndexedRow[];
  summary: RunSummary;
  summary_path: string;
};

export function reportPool(name: string, filePath: string | null, pool: readonly IndexedRow[]): PoolReport {
  return { name, path: filePath, rows: pool.length, label_dist: labelDistribution(pool) };
}

export function logPool(logger: CorpusLogger, report: PoolReport): void {
  logger.info(`${report.name}: ${report.path ?? "(not written)"} rows=${report.rows} label_dist=${formatDistribution(report.label_dist)}`);
}

/**
 * Load -> build -> split or pass through -> (synthetic dedup) -> merge -> normalize -> index
 * -> persist. Without synthetic input the merge step is a plain finalize of each split.
 */
export function buildCorpus(config: PipelineConfig, logger: CorpusLogger = createCorpusLogger()): BuildCorpusResult {
  const summaryPath = resolveRunSummaryPath(config.out_dir);
  const summary: RunSummary = {
    version: "corpus_run_v1",
    command: config.synthetic ? "build" : "transform",
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
    const primary = loadPrimaryPools(config, logger);
    for (const [name, counters] of Object.entries(primary.counters)) {
      summary.counters[name] = counters;
    }

    let synthRows: CanonicalRow[] = [];
    if (config.synthetic) {
      const prepared = prepareSyntheticPool(config.synthetic, config, primary.pools.train, logger);
      summary.counters.synthetic = prepared.counters;
      synthRows = prepared.rows;
    }
    const augmented = config.synthetic !== null;

    const merged = mergeAugmented({
      train: primary.pools.train,
      val: primary.pools.val,
      test: primary.pools.test,
      synth: synthRows,
      policy: config.augment_split,
    });
    if (config.augment_split === "all" && augmented) {
      logger.warn("augment_split=all puts synthetic rows into val/test; evaluation is no longer leakage-free.");
    }
    if (merged.synth_dropped_eval_overlap > 0) {
      logger.warn(`Withheld ${merged.synth_dropped_eval_overlap} synthetic row(s) whose code already appears in val/test.`);
    }

    const val = merged.val ?? [];
    const test = merged.test ?? [];
    const trainPath = augmented ? resolveAugmentedTrainPath(config.out_dir) : resolveSplitPath(config.out_dir, "train");
    const outputs: Array<[string, string, IndexedRow[]]> = [
      [augmented ? "Train_aug" : "Train", trainPath, merged.train],
      ["Val", resolveSplitPath(config.out_dir, "val"), val],
      ["Test", resolveSplitPath(config.out_dir, "test"), test],
    ];

    for (const [, filePath, pool] of outputs) {
      assertIndexedPool(filePath, pool);
    }
    for (const [, filePath, pool] of outputs) {
      writeIndexedPool(filePath, pool);
    }
    for (const [name, filePath, pool] of outputs) {
      const report = reportPool(name, filePath, pool);
      summary.pools.push(report);
      logPool(logger, report);
    }
    if (augmented) {
      summary.counters.leakage = {
        synth_rows_in_val: countSharedFingerprints(merged.synth_used, val),
        synth_rows_in_test: countSharedFingerprints(merged.synth_used, test),
        synth_dropped_eval_overlap: merged.synth_dropped_eval_overlap,
      };
    }

    summary.status = "completed";
    writeRunSummary(summaryPath, summary);
    return { train: merged.train, val, test, summary, summary_path: summaryPath };
  } catch (error) {
    summary.failure = toFailureArtifact(error, "build");
    logger.error(summary.failure.reason);
    persistFailedSummary(summaryPath, summary, logger);
    throw error;
  }
}

/** Primary source only: split (or pass through), normalize, index and persist. */
export function transformPrimary(config: PipelineConfig, logger: CorpusLogger = createCorpusLogger()): BuildCorpusResult {
  return buildCorpus({ ...config, synthetic: null }, logger);
}
