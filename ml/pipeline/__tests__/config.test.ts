import path from "node:path";

import { describe, expect, it } from "vitest";

import { DEFAULT_SEED, parseRatios, resolvePipelineConfig, resolvePrimaryInput } from "../config";
import { CorpusPipelineError } from "../errors";

function captureError(run: () => unknown): CorpusPipelineError {
  try {
    run();
  } catch (error) {
    if (error instanceof CorpusPipelineError) return error;
    throw error;
  }
  throw new Error("expected a CorpusPipelineError");
}

describe("resolvePipelineConfig", () => {
  it("applies defaults", () => {
    const config = resolvePipelineConfig({ all_jsonl: "all.jsonl", out_dir: "out" }, {});

    expect(config).toEqual({
      primary: { kind: "combined", all_jsonl: "all.jsonl" },
      synthetic: null,
      out_dir: path.resolve("out"),
      seed: DEFAULT_SEED,
      ratios: [0.8, 0.1, 0.1],
      filter_lang: undefined,
      dedup_within_synth: false,
      dedup_against_train: false,
      keep_only_complete: false,
      augment_split: "train_only",
      debug_n: 0,
    });
  });

  it("lets options win over the environment", () => {
    const env = { CORPUS_SEED: "7", CORPUS_OUT_DIR: "/tmp/env-out", CORPUS_AUGMENT_SPLIT: "all" };

    expect(resolvePipelineConfig({ all_jsonl: "a.jsonl" }, env)).toMatchObject({
      seed: 7,
      out_dir: "/tmp/env-out",
      augment_split: "all",
    });
    expect(resolvePipelineConfig({ all_jsonl: "a.jsonl", seed: "11", augment_split: "train_only" }, env)).toMatchObject({
      seed: 11,
      augment_split: "train_only",
    });
  });

  it("accepts ratios as text", () => {
    const config = resolvePipelineConfig({ all_jsonl: "a.jsonl", out_dir: "o", ratios: "0.6, 0.2, 0.2" }, {});

    expect(config.ratios).toEqual([0.6, 0.2, 0.2]);
  });

  it("reports every invalid field", () => {
    const error = captureError(() =>
      resolvePipelineConfig({ all_jsonl: "a.jsonl", seed: "abc", ratios: "0.5,0.5,0.5", augment_split: "val_only" }, {})
    );

    expect(error.code).toBe("CONFIG_INVALID");
    expect(error.details.map((detail) => detail.split(":")[0]).sort()).toEqual([
      "augment_split",
      "out_dir",
      "ratios",
      "seed",
    ]);
  });

  it("needs both synthetic tables", () => {
    const error = captureError(() => resolvePipelineConfig({ all_jsonl: "a.jsonl", out_dir: "o", csv_vuln: "v.csv" }, {}));

    expect(error.code).toBe("CONFIG_CONTRADICTORY");
  });
});

describe("resolvePrimaryInput", () => {
  it("takes three per-split files", () => {
    expect(resolvePrimaryInput({ train_jsonl: "t", val_jsonl: "v", test_jsonl: "s" })).toEqual({
      kind: "per_split",
      train_jsonl: "t",
      val_jsonl: "v",
      test_jsonl: "s",
    });
  });

  it.each([
    ["neither form", {}],
    ["a partial per-split set", { train_jsonl: "t", val_jsonl: "v" }],
    ["both forms", { all_jsonl: "a", train_jsonl: "t", val_jsonl: "v", test_jsonl: "s" }],
  ])("rejects %s", (_label, options) => {
    expect(captureError(() => resolvePrimaryInput(options)).code).toBe("CONFIG_CONTRADICTORY");
  });
});

describe("parseRatios", () => {
  it("defaults to 80/10/10", () => {
    expect(parseRatios(undefined)).toEqual([0.8, 0.1, 0.1]);
  });
});
