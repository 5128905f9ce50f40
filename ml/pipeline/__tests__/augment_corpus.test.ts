import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createCorpusLogger } from "../../logging/corpus_logger";
import { augmentCorpus, resolveAugmentConfig } from "../augment_corpus";
import { CorpusPipelineError } from "../errors";

let tmpDir: string;
let realDir: string;

function writeFile(filePath: string, lines: string[]): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${lines.join("\n")}\n`);
  return filePath;
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "corpus-augment-"));
  realDir = path.join(tmpDir, "real");
  writeFile(path.join(realDir, "train.csv"), [
    "index,processed_func,target",
    '0,"int a(void) { return 0; }",0',
    '1,"int b(void) { return 1; }",1',
  ]);
  writeFile(path.join(realDir, "val.csv"), ["index,processed_func,target", '0,"int c(void) { return 1; }",1']);
  writeFile(path.join(tmpDir, "vuln.csv"), ["code", '"int y(void) { return 1; }"', '"int c(void) { return 1; }"']);
  writeFile(path.join(tmpDir, "nonvuln.csv"), ["code", '"int a(void) { return 0; }"']);
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("resolveAugmentConfig", () => {
  it("detects val/test beside the train file", () => {
    const config = resolveAugmentConfig(
      {
        raw_train: path.join(realDir, "train.csv"),
        csv_vuln: path.join(tmpDir, "vuln.csv"),
        csv_nonvuln: path.join(tmpDir, "nonvuln.csv"),
      },
      {}
    );

    expect(config.raw_val).toBe(path.join(realDir, "val.csv"));
    expect(config.raw_test).toBeNull();
    expect(config.out_dir).toBe(realDir);
    expect(config.augment_split).toBe("train_only");
  });

  it("requires the real train file", () => {
    expect(() => resolveAugmentConfig({ csv_vuln: "v.csv", csv_nonvuln: "n.csv" }, {})).toThrowError(CorpusPipelineError);
  });

  it("requires both synthetic tables", () => {
    try {
      resolveAugmentConfig({ raw_train: path.join(realDir, "train.csv"), csv_vuln: "v.csv" }, {});
      expect.unreachable();
    } catch (error) {
      expect(error instanceof CorpusPipelineError ? error.details : null).toEqual(["csv_nonvuln: Required"]);
    }
  });
});

describe("augmentCorpus", () => {
  it("writes train_aug.csv and the splits that exist", () => {
    const outDir = path.join(tmpDir, "out");
    const config = resolveAugmentConfig(
      {
        raw_train: path.join(realDir, "train.csv"),
        csv_vuln: path.join(tmpDir, "vuln.csv"),
        csv_nonvuln: path.join(tmpDir, "nonvuln.csv"),
        out_dir: outDir,
        dedup_against_train: true,
      },
      {}
    );

    const result = augmentCorpus(config, createCorpusLogger({ silent: true }));

    expect(result.train.map((row) => [row.index, row.processed_func, row.target])).toEqual([
      [0, "int a(void) { return 0; }", 0],
      [1, "int b(void) { return 1; }", 1],
      [2, "int y(void) { return 1; }", 1],
    ]);
    expect(result.val?.map((row) => row.processed_func)).toEqual(["int c(void) { return 1; }"]);
    expect(result.test).toBeNull();
    expect(fs.readdirSync(outDir).sort()).toEqual(["run_summary.json", "train_aug.csv", "val.csv"]);
    expect(result.summary.not_written).toEqual(["test"]);
    expect(result.summary.counters.synthetic).toMatchObject({ dropped_against_train: 1, used: 2 });
    expect(result.summary.counters.leakage).toEqual({
      synth_rows_in_val: 0,
      synth_rows_in_test: 0,
      synth_dropped_eval_overlap: 1,
    });
  });

  it("puts synthetic rows into every split under the all policy", () => {
    const config = resolveAugmentConfig(
      {
        raw_train: path.join(realDir, "train.csv"),
        raw_test: path.join(realDir, "val.csv"),
        csv_vuln: path.join(tmpDir, "vuln.csv"),
        csv_nonvuln: path.join(tmpDir, "nonvuln.csv"),
        out_dir: path.join(tmpDir, "all"),
        augment_split: "all",
      },
      {}
    );
    const logger = createCorpusLogger({ silent: true });

    const result = augmentCorpus(config, logger);

    expect(result.train).toHaveLength(5);
    expect(result.val).toHaveLength(4);
    expect(result.test).toHaveLength(4);
    expect(result.summary.counters.leakage).toEqual({
      synth_rows_in_val: 4,
      synth_rows_in_test: 4,
      synth_dropped_eval_overlap: 0,
    });
    expect(logger.entries.some((entry) => entry.level === "warn")).toBe(true);
  });

  it("fails when a synthetic table has no code column", () => {
    writeFile(path.join(tmpDir, "nonvuln.csv"), ["body", "x"]);
    const config = resolveAugmentConfig(
      {
        raw_train: path.join(realDir, "train.csv"),
        csv_vuln: path.join(tmpDir, "vuln.csv"),
        csv_nonvuln: path.join(tmpDir, "nonvuln.csv"),
        out_dir: path.join(tmpDir, "broken"),
      },
      {}
    );

    expect(() => augmentCorpus(config, createCorpusLogger({ silent: true }))).toThrowError(
      /must contain 'processed_func' or 'code'/
    );
    expect(fs.readdirSync(path.join(tmpDir, "broken"))).toEqual(["run_summary.json"]);
  });
});
