import fs from "node:fs";
import path from "node:path";

import type { SplitName } from "../schemas/canonical_row";

export function resolveSplitPath(outDir: string, split: SplitName): string {
  return path.resolve(outDir, `${split}.csv`);
}

export function resolveAugmentedTrainPath(outDir: string): string {
  return path.resolve(outDir, "train_aug.csv");
}

export function resolveRunSummaryPath(outDir: string): string {
  return path.resolve(outDir, "run_summary.json");
}

/** Looks for `<split>.csv` beside the train file. */
export function autoDetectSplit(trainCsv: string, split: SplitName): string | null {
  const candidate = path.join(path.dirname(path.resolve(trainCsv)), `${split}.csv`);
  return fs.existsSync(candidate) ? candidate : null;
}

export function resolveSelectionPath(csvPath: string): string {
  const resolved = path.resolve(csvPath);
  const base = path.basename(resolved, path.extname(resolved));
  return path.join(path.dirname(resolved), `${base}_selected_indices.csv`);
}
