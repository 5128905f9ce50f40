import type { CanonicalRow, IndexedRow, RowPool } from "../schemas/canonical_row";
import { normalizeTable } from "../schemas/normalize";
import { fingerprintSet, fingerprintRow } from "./dedupe";

export const AUGMENT_SCOPES = ["train_only", "all"] as const;
export type AugmentScope = (typeof AUGMENT_SCOPES)[number];

export type MergeInput = {
  train: RowPool;
  val: RowPool | null;
  test: RowPool | null;
  synth: RowPool;
  policy?: AugmentScope;
};

export type MergeResult = {
  policy: AugmentScope;
  train: IndexedRow[];
  val: IndexedRow[] | null;
  test: IndexedRow[] | null;
  /** Synthetic rows that entered at least one output pool. */
  synth_used: CanonicalRow[];
  /** Synthetic rows withheld because their code already sits in val or test. */
  synth_dropped_eval_overlap: number;
};

/** Dense 0-based index in final row order. Always the last step before persisting. */
export function assignIndex(pool: RowPool): IndexedRow[] {
  return pool.map((row, index) => ({ index, ...row }));
}

export function finalizePool(pool: RowPool): IndexedRow[] {
  const normalized = normalizeTable(pool).filter((row) => row.processed_func.length > 0);
  return assignIndex(normalized);
}

/**
 * Combines real splits with a synthetic pool. `train_only` keeps val/test exactly as given and
 * withholds any synthetic row whose code already appears there; `all` appends the synthetic
 * pool to every split that exists, which leaks generator characteristics into evaluation.
 */
export function mergeAugmented(input: MergeInput): MergeResult {
  const policy = input.policy ?? "train_only";

  if (policy === "all") {
    return {
      policy,
      train: finalizePool([...input.train, ...input.synth]),
      val: input.val ? finalizePool([...input.val, ...input.synth]) : null,
      test: input.test ? finalizePool([...input.test, ...input.synth]) : null,
      synth_used: [...input.synth],
      synth_dropped_eval_overlap: 0,
    };
  }

  const evalHashes = fingerprintSet([...(input.val ?? []), ...(input.test ?? [])]);
  const synth = input.synth.filter((row) => !evalHashes.has(fingerprintRow(row)));

  return {
    policy,
    train: finalizePool([...input.train, ...synth]),
    val: input.val ? finalizePool(input.val) : null,
    test: input.test ? finalizePool(input.test) : null,
    synth_used: synth,
    synth_dropped_eval_overlap: input.synth.length - synth.length,
  };
}
