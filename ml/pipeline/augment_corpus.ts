import path from "node:path";

import { z } from "zod";

import { AUGMENT_SCOPES, mergeAugmented } from "../curation/augment_merge";
import { countSharedFingerprints } from "../curation/dedupe";
import { assertIndexedPool, readCanonicalPool, writeIndexedPool } from "../io/corpus_tables";
import { createCorpusLogger, type CorpusLogger } from "../logging/corpus_logger";
import type { CanonicalRow, IndexedRow, SplitName } from "../schemas/canonical_row";
import { CorpusPipelineError, toFailureArtifact } from "./errors";
import { logPool, reportPool } from "./build_corpus";
import { validateConfig, type CorpusEnv } from "./config";
import { autoDetectSplit, resolveAugmentedTrainPath, resolveRunSummaryPath, resolveSplitPath } from "./paths";
import { persistFailedSummary, writeRunSummary, type RunSummary } from "./run_summary";
import { prepareSyntheticPool } from "./stages";

export const AugmentConfigSchema = z.object({
  raw_train: z.string().min(1),
  raw_val: z.string().min(1).nullable(),
  raw_test: z.string().min(1).nullable(),
  csv_vuln: z.string().min(1),
  csv_nonvuln: z.string().min(1),
  out_dir: z.string().min(1),
  dedup_within_synth: z.boolean(),
  dedup_against_train: z.boolean(),
  keep_only_complete: z.boolean(),
  augment_split: z.enum(AUGMENT_SCOPES),
});
export type AugmentConfig = z.infer<typeof AugmentConfigSchema>;

export type AugmentOptions = {
  raw_train?: string;
  raw_val?: string;
  raw_test?: string;
  csv_vuln?: string;
  csv_nonvuln?: string;
  out_dir?: string;
  dedup_within_synth?: boolean;
  dedup_against_train?: boolean;
  keep_only_complete?: boolean;
  augment_split?: string;
};

export type AugmentCorpusResult = {
  train: IndexedRow[];
  val: IndexedRow[] | null;
  test: IndexedRow[] | null;
  summary: RunSummary;
  summary_path: string;
};

function resolveEvalSplit(explicit: string | undefined, rawTrain: string | undefined, split: SplitName): string | null {
  if (explicit) return path.resolve(explicit);
  if (!rawTrain) return null;
  return autoDetectSplit(rawTrain, split);
}

/**
 * Val/test fall back to `val.csv` / `test.csv` beside the train file; the output directory
 * falls back to `CORPUS_OUT_DIR`, then to the train file's directory.
 */
export function resolveAugmentConfig(options: AugmentOptions, env: CorpusEnv = process.env): AugmentConfig {
  if (!options.raw_train) {
    throw new CorpusPipelineError({
      code: "CONFIG_CONTRADICTORY",
      stage: "config",
      reason: "Augmentation needs --raw_train.",
      next_action: "Pass the real train CSV with --raw_train, then rerun.",
    });
  }
  const outDir = options.out_dir ?? env.CORPUS_OUT_DIR ?? path.dirname(path.resolve(options.raw_train));
  const candidate = {
    raw_train: path.resolve(options.raw_train),
    raw_val: resolveEvalSplit(options.raw_val, options.raw_train, "val"),
    raw_test: resolveEvalSplit(options.raw_test, options.raw_train, "test"),
    csv_vuln: options.csv_vuln,
    csv_nonvuln: options.csv_nonvuln,
    out_dir: path.resolve(outDir),
    dedup_within_synth: options.dedup_within_synth ?? false,
    dedup_against_train: options.dedup_against_train ?? false,
    keep_only_complete: options.keep_only_complete ?? false,
    augment_split: options.augment_split ?? env.CORPUS_AUGMENT_SPLIT ?? "train_only",
  };
  return validateConfig(AugmentConfigSchema, candidate);
}

function loadOptionalSplit(
  filePath: string | null,
  name: string,
  logger: CorpusLogger
): CanonicalRow[] | null {
  if (!filePath) {
    logger.info(`${name}: not found beside the train file; skipped.`);
    return null;
  }
  return readCanonicalPool(filePath, "load");
}

/**
 * Merges synthetic rows into already-transformed real splits and writes `train_aug.csv`, plus
 * `val.csv` / `test.csv` for whichever evaluation splits were found.
 */
export function augmentCorpus(
  config: AugmentConfig,
  logger: CorpusLogger = createCorpusLogger()
): AugmentCorpusResult {
  const summaryPath = resolveRunSummaryPath(config.out_dir);
  const summary: RunSummary = {
    version: "corpus_run_v1",
    command: "augment",
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
    const train = readCanonicalPool(config.raw_train, "load");
    const val = loadOptionalSplit(config.raw_val, "Val", logger);
    const test = loadOptionalSplit(config.raw_test, "Test", logger);

    const synthetic = prepareSyntheticPool(
      { vuln_csv: config.csv_vuln, nonvuln_csv: config.csv_nonvuln },
      config,
      train,
      logger
    );
    summary.counters.synthetic = synthetic.counters;

    const merged = mergeAugmented({ train, val, test, synth: synthetic.rows, policy: config.augment_split });
    if (config.augment_split === "all") {
      logger.warn("augment_split=all puts synthetic rows into val/test; evaluation is no longer leakage-free.");
    }
    if (merged.synth_dropped_eval_overlap > 0) {
      logger.warn(`Withheld ${merged.synth_dropped_eval_overlap} synthetic row(s) whose code already appears in val/test.`);
    }

    const outputs: Array<[string, string, IndexedRow[]]> = [
      ["Train_aug", resolveAugmentedTrainPath(config.out_dir), merged.train],
    ];
    const evalSplits: Array<[string, SplitName, IndexedRow[] | null]> = [
      ["Val", "val", merged.val],
      ["Test", "test", merged.test],
    ];
    for (const [name, split, pool] of evalSplits) {
      if (pool) {
        outputs.push([name, resolveSplitPath(config.out_dir, split), pool]);
      } else {
        summary.not_written.push(split);
      }
    }

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
    for (const split of summary.not_written) {
      logger.info(`${split}.csv not written: no ${split} split was provided or detected.`);
    }

    summary.counters.leakage = {
      synth_rows_in_val: merged.val ? countSharedFingerprints(merged.synth_used, merged.val) : 0,
      synth_rows_in_test: merged.test ? countSharedFingerprints(merged.synth_used, merged.test) : 0,
      synth_dropped_eval_overlap: merged.synth_dropped_eval_overlap,
    };

    summary.status = "completed";
    writeRunSummary(summaryPath, summary);
    return { train: merged.train, val: merged.val, test: merged.test, summary, summary_path: summaryPath };
  } catch (error) {
    summary.failure = toFailureArtifact(error, "augment");
    logger.error(summary.failure.reason);
    persistFailedSummary(summaryPath, summary, logger);
    throw error;
  }
}
