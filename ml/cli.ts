#!/usr/bin/env node
import "dotenv/config";

import { Command } from "commander";

import { createCorpusLogger } from "./logging/corpus_logger";
import { augmentCorpus, resolveAugmentConfig, type AugmentOptions } from "./pipeline/augment_corpus";
import { buildCorpus, transformPrimary } from "./pipeline/build_corpus";
import { resolvePipelineConfig, type PipelineOptions } from "./pipeline/config";
import { convertPrimevul, resolvePrimevulConfig } from "./pipeline/convert_primevul";
import { CorpusPipelineError } from "./pipeline/errors";
import { selectIndices, type SelectIndicesOptions } from "./pipeline/select_indices";
import type { RunSummary } from "./pipeline/run_summary";

function printSummary(summary: RunSummary, summaryPath: string) {
  console.log(JSON.stringify({ status: summary.status, pools: summary.pools, summary: summaryPath }, null, 2));
}

function withPrimaryOptions(command: Command): Command {
  return command
    .option("--all_jsonl <path>", "Combined JSONL to split into train/val/test")
    .option("--train_jsonl <path>", "Train JSONL (per-split input, no re-split)")
    .option("--val_jsonl <path>", "Val JSONL (per-split input)")
    .option("--test_jsonl <path>", "Test JSONL (per-split input)")
    .option("--out_dir <dir>", "Output directory (default: $CORPUS_OUT_DIR)")
    .option("--seed <number>", "Split seed (default: $CORPUS_SEED or 123456)")
    .option("--ratios <a,b,c>", "Train/val/test ratios (default: 0.8,0.1,0.1)")
    .option("--filter_lang <lang>", "Keep only details whose file_language matches")
    .option("--debug_n <number>", "Log the first N skipped records", "0");
}

function withSyntheticOptions(command: Command): Command {
  return command
    .option("--csv_vuln <path>", "Synthetic vulnerable CSV")
    .option("--csv_nonvuln <path>", "Synthetic non-vulnerable CSV")
    .option("--dedup_within_synth", "Drop duplicate code inside the synthetic pool")
    .option("--dedup_against_train", "Drop synthetic code already present in real train")
    .option("--keep_only_complete", "Keep synthetic rows with a truthy is_complete only")
    .option("--augment_split <scope>", "train_only | all (default: $CORPUS_AUGMENT_SPLIT or train_only)");
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("vulcorpus")
    .description("Builds canonical vulnerability-detection CSV tables from JSONL and synthetic CSV sources")
    .version("1.0.0");

  withPrimaryOptions(program.command("transform").description("Primary JSONL to train/val/test CSV")).action(
    (options: PipelineOptions) => {
      const result = transformPrimary(resolvePipelineConfig(options), createCorpusLogger());
      printSummary(result.summary, result.summary_path);
    }
  );

  withSyntheticOptions(
    withPrimaryOptions(program.command("build").description("Primary JSONL plus synthetic CSVs, end to end"))
  ).action((options: PipelineOptions) => {
    const result = buildCorpus(resolvePipelineConfig(options), createCorpusLogger());
    printSummary(result.summary, result.summary_path);
  });

  withSyntheticOptions(program.command("augment").description("Merge synthetic CSVs into transformed splits"))
    .option("--raw_train <path>", "Real train CSV")
    .option("--raw_val <path>", "Real val CSV (default: val.csv beside the train CSV)")
    .option("--raw_test <path>", "Real test CSV (default: test.csv beside the train CSV)")
    .option("--out_dir <dir>", "Output directory (default: $CORPUS_OUT_DIR or the train CSV's directory)")
    .action((options: AugmentOptions) => {
      const result = augmentCorpus(resolveAugmentConfig(options), createCorpusLogger());
      printSummary(result.summary, result.summary_path);
    });

  program
    .command("primevul")
    .description("Flat PrimeVul-style JSONL to an indexed CSV of plain C functions")
    .requiredOption("-i, --input <path>", "Input JSONL")
    .requiredOption("-o, --output <path>", "Output CSV")
    .action((options: { input?: string; output?: string }) => {
      const result = convertPrimevul(resolvePrimevulConfig(options), createCorpusLogger());
      printSummary(result.summary, result.summary_path);
    });

  program
    .command("select")
    .description("Write selected rows of a CSV to <name>_selected_indices.csv")
    .argument("<csv_path>", "CSV to read")
    .argument("<indices>", 'all | "[2, 67, 71]" | "2,67,71" (0-based data rows)')
    .option("--columns <list>", "Comma list of columns to keep")
    .option("--filter <column=value>", "Keep rows whose column contains value")
    .action((csvPath: string, indices: string, options: Pick<SelectIndicesOptions, "columns" | "filter">) => {
      const result = selectIndices({ csv_path: csvPath, indices, ...options }, createCorpusLogger());
      console.log(JSON.stringify(result, null, 2));
    });

  return program;
}

export function formatCliError(error: unknown): string {
  if (error instanceof CorpusPipelineError) {
    return JSON.stringify(error.toFailureArtifact(), null, 2);
  }
  return error instanceof Error ? error.stack ?? error.message : String(error);
}

async function main() {
  await createProgram().parseAsync(process.argv);
}

if (process.argv[1]?.includes("cli.ts")) {
  main().catch((error) => {
    console.error(formatCliError(error));
    process.exitCode = 1;
  });
}
