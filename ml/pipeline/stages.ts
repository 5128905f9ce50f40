import { dedupeRows, removeOverlap } from "../curation/dedupe";
import { formatDistribution, labelDistribution } from "../curation/label_stats";
import { stratifiedSplit, type SplitPools } from "../curation/sampling";
import { collectRows, type RowBuildCounters, type SkipReason } from "../extraction/row_builder";
import { isRecord } from "../extraction/text";
import { readCsvTable } from "../io/csv_io";
import { createJsonlReadStats, readJsonlRecords, type JsonlReadStats } from "../io/jsonl";
import type { CorpusLogger } from "../logging/corpus_logger";
import type { CanonicalRow, RowPool } from "../schemas/canonical_row";
import { buildSyntheticPool, type SyntheticCounters } from "../sources/synthetic";
import type { PipelineConfig, SyntheticInput } from "./config";

export type SourceCounters = JsonlReadStats & RowBuildCounters;

export type PrimaryLoadResult = {
  pools: SplitPools;
  counters: Record<string, SourceCounters>;
  split_performed: boolean;
};

function describeSkip(reason: SkipReason, subject: unknown): string {
  if (isRecord(subject)) {
    return `${reason}; keys: ${Object.keys(subject).join(", ")}`;
  }
  return `${reason}; value type: ${Array.isArray(subject) ? "array" : typeof subject}`;
}

export function buildPoolFromJsonl(
  filePath: string,
  config: Pick<PipelineConfig, "filter_lang" | "debug_n">,
  logger: CorpusLogger
): { rows: CanonicalRow[]; counters: SourceCounters } {
  const stats = createJsonlReadStats();
  let debugLeft = config.debug_n;
  const { rows, counters } = collectRows(readJsonlRecords(filePath, stats), {
    filter_lang: config.filter_lang,
    onSkip: (reason, subject) => {
      if (debugLeft <= 0) return;
      debugLeft -= 1;
      logger.info(`[debug] ${describeSkip(reason, subject)}`);
    },
  });
  return { rows, counters: { ...stats, ...counters } };
}

/**
 * Per-split inputs pass through as they are; a combined input is split with the configured
 * seed and ratios.
 */
export function loadPrimaryPools(config: PipelineConfig, logger: CorpusLogger): PrimaryLoadResult {
  const { primary } = config;

  if (primary.kind === "per_split") {
    const train = buildPoolFromJsonl(primary.train_jsonl, config, logger);
    const val = buildPoolFromJsonl(primary.val_jsonl, config, logger);
    const test = buildPoolFromJsonl(primary.test_jsonl, config, logger);
    logger.counts(`Train: ${train.rows.length}`, train.counters);
    logger.counts(`Val:   ${val.rows.length}`, val.counters);
    logger.counts(`Test:  ${test.rows.length}`, test.counters);
    return {
      pools: { train: train.rows, val: val.rows, test: test.rows },
      counters: { train: train.counters, val: val.counters, test: test.counters },
      split_performed: false,
    };
  }

  const all = buildPoolFromJsonl(primary.all_jsonl, config, logger);
  logger.counts(`All: ${all.rows.length}`, all.counters);
  const pools = stratifiedSplit(all.rows, config.seed, config.ratios);
  logger.info(
    `Split seed=${config.seed} train=${pools.train.length} val=${pools.val.length} test=${pools.test.length}`
  );
  return { pools, counters: { all: all.counters }, split_performed: true };
}

export type SyntheticPrepareOptions = {
  keep_only_complete: boolean;
  dedup_within_synth: boolean;
  dedup_against_train: boolean;
};

export type SyntheticPrepareCounters = SyntheticCounters & {
  dropped_within_synth: number;
  dropped_against_train: number;
  used: number;
};

/**
 * Maps the synthetic tables and applies the selected dedup steps, intra-synthetic first.
 */
export function prepareSyntheticPool(
  input: SyntheticInput,
  options: SyntheticPrepareOptions,
  realTrain: RowPool,
  logger: CorpusLogger
): { rows: CanonicalRow[]; counters: SyntheticPrepareCounters } {
  const mapped = buildSyntheticPool({
    vuln: readCsvTable(input.vuln_csv, "synthetic"),
    nonvuln: readCsvTable(input.nonvuln_csv, "synthetic"),
    keep_only_complete: options.keep_only_complete,
  });

  let rows = mapped.rows;
  let droppedWithin = 0;
  let droppedAgainstTrain = 0;

  if (options.dedup_within_synth) {
    const deduped = dedupeRows(rows);
    droppedWithin = rows.length - deduped.length;
    rows = deduped;
  }
  if (options.dedup_against_train) {
    const filtered = removeOverlap(realTrain, rows);
    droppedAgainstTrain = rows.length - filtered.length;
    rows = filtered;
  }

  logger.info(
    `Synthetic: mapped=${mapped.rows.length} dropped_within_synth=${droppedWithin} ` +
      `dropped_against_train=${droppedAgainstTrain} used=${rows.length} ` +
      `label_dist=${formatDistribution(labelDistribution(rows))}`
  );

  return {
    rows,
    counters: {
      ...mapped.counters,
      dropped_within_synth: droppedWithin,
      dropped_against_train: droppedAgainstTrain,
      used: rows.length,
    },
  };
}
