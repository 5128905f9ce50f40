import path from "node:path";

import { z } from "zod";

import { AUGMENT_SCOPES } from "../curation/augment_merge";
import { DEFAULT_SPLIT_RATIOS, type SplitRatios } from "../curation/sampling";
import { CorpusPipelineError } from "./errors";

export const DEFAULT_SEED = 123456;

const RatioTupleSchema = z
  .tuple([z.number().finite().min(0), z.number().finite().min(0), z.number().finite().min(0)])
  .refine((ratios) => Math.abs(ratios[0] + ratios[1] + ratios[2] - 1) <= 1e-9, "ratios must sum to 1");

const PrimaryInputSchema = z.union([
  z.object({ kind: z.literal("combined"), all_jsonl: z.string().min(1) }),
  z.object({
    kind: z.literal("per_split"),
    train_jsonl: z.string().min(1),
    val_jsonl: z.string().min(1),
    test_jsonl: z.string().min(1),
  }),
]);
export type PrimaryInput = z.infer<typeof PrimaryInputSchema>;

const SyntheticInputSchema = z.object({
  vuln_csv: z.string().min(1),
  nonvuln_csv: z.string().min(1),
});
export type SyntheticInput = z.infer<typeof SyntheticInputSchema>;

export const PipelineConfigSchema = z.object({
  primary: PrimaryInputSchema,
  synthetic: SyntheticInputSchema.nullable(),
  out_dir: z.string().min(1),
  seed: z.number().int(),
  ratios: RatioTupleSchema,
  filter_lang: z.string().min(1).optional(),
  dedup_within_synth: z.boolean(),
  dedup_against_train: z.boolean(),
  keep_only_complete: z.boolean(),
  augment_split: z.enum(AUGMENT_SCOPES),
  debug_n: z.number().int().min(0),
});
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/** Loose option bag as it comes from flags or callers; every field optional. */
export type PipelineOptions = {
  all_jsonl?: string;
  train_jsonl?: string;
  val_jsonl?: string;
  test_jsonl?: string;
  csv_vuln?: string;
  csv_nonvuln?: string;
  out_dir?: string;
  seed?: number | string;
  ratios?: SplitRatios | string;
  filter_lang?: string;
  dedup_within_synth?: boolean;
  dedup_against_train?: boolean;
  keep_only_complete?: boolean;
  augment_split?: string;
  debug_n?: number | string;
};

export type CorpusEnv = Partial<Record<string, string>>;

function parseNumber(value: number | string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

export function parseRatios(value: SplitRatios | string | undefined): number[] {
  if (value === undefined) return [...DEFAULT_SPLIT_RATIOS];
  if (typeof value !== "string") return [...value];
  return value.split(",").map((part) => Number(part.trim()));
}

export function resolvePrimaryInput(options: PipelineOptions): PrimaryInput {
  const perSplit = [options.train_jsonl, options.val_jsonl, options.test_jsonl];
  const givenSplits = perSplit.filter((value) => Boolean(value)).length;

  if (givenSplits === 3 && options.train_jsonl && options.val_jsonl && options.test_jsonl) {
    if (options.all_jsonl) {
      throw new CorpusPipelineError({
        code: "CONFIG_CONTRADICTORY",
        stage: "config",
        reason: "Pass either per-split JSONL files or --all_jsonl, not both.",
      });
    }
    return {
      kind: "per_split",
      train_jsonl: options.train_jsonl,
      val_jsonl: options.val_jsonl,
      test_jsonl: options.test_jsonl,
    };
  }

  if (givenSplits > 0) {
    throw new CorpusPipelineError({
      code: "CONFIG_CONTRADICTORY",
      stage: "config",
      reason: "Per-split input needs all of --train_jsonl, --val_jsonl and --test_jsonl.",
    });
  }

  if (!options.all_jsonl) {
    throw new CorpusPipelineError({
      code: "CONFIG_CONTRADICTORY",
      stage: "config",
      reason: "Provide either (train/val/test JSONL) or --all_jsonl.",
    });
  }

  return { kind: "combined", all_jsonl: options.all_jsonl };
}

function resolveSynthetic(options: PipelineOptions): SyntheticInput | null {
  if (!options.csv_vuln && !options.csv_nonvuln) return null;
  if (!options.csv_vuln || !options.csv_nonvuln) {
    throw new CorpusPipelineError({
      code: "CONFIG_CONTRADICTORY",
      stage: "config",
      reason: "Synthetic augmentation needs both --csv_vuln and --csv_nonvuln.",
      next_action: "Pass both synthetic CSVs, or neither, then rerun.",
    });
  }
  return { vuln_csv: options.csv_vuln, nonvuln_csv: options.csv_nonvuln };
}

export function validateConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, candidate: unknown, stage = "config"): T {
  const parsed = schema.safeParse(candidate);
  if (!parsed.success) {
    throw new CorpusPipelineError({
      code: "CONFIG_INVALID",
      stage,
      reason: "Invalid pipeline configuration.",
      details: parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    });
  }
  return parsed.data;
}

/**
 * Explicit options win over `CORPUS_*` environment values, which win over defaults.
 */
export function resolvePipelineConfig(options: PipelineOptions, env: CorpusEnv = process.env): PipelineConfig {
  const outDir = options.out_dir ?? env.CORPUS_OUT_DIR;
  const candidate = {
    primary: resolvePrimaryInput(options),
    synthetic: resolveSynthetic(options),
    out_dir: outDir ? path.resolve(outDir) : undefined,
    seed: parseNumber(options.seed) ?? parseNumber(env.CORPUS_SEED) ?? DEFAULT_SEED,
    ratios: parseRatios(options.ratios),
    filter_lang: options.filter_lang?.trim() || undefined,
    dedup_within_synth: options.dedup_within_synth ?? false,
    dedup_against_train: options.dedup_against_train ?? false,
    keep_only_complete: options.keep_only_complete ?? false,
    augment_split: options.augment_split ?? env.CORPUS_AUGMENT_SPLIT ?? "train_only",
    debug_n: parseNumber(options.debug_n) ?? 0,
  };
  return validateConfig(PipelineConfigSchema, candidate);
}
