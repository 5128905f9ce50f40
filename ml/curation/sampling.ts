import type { CanonicalRow, RowPool } from "../schemas/canonical_row";
import { CorpusPipelineError } from "../pipeline/errors";

/**
 * Seeded random number generator (mulberry32). Each split run builds its own instance so
 * no two runs share generator state.
 */
export class SeededRng {
  private state: number;

  constructor(seed: number) {
    this.state = Math.floor(seed) >>> 0;
  }

  /**
   * Returns random float in [0, 1)
   */
  random(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Returns random integer in [min, max]
   */
  int(min: number, max: number): number {
    return Math.floor(this.random() * (max - min + 1)) + min;
  }

  /**
   * Fisher-Yates over a copy; the input is not touched.
   */
  shuffle<T>(items: readonly T[]): T[] {
    const arr = items.slice();
    for (let i = arr.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      [arr[i], arr[j]] = [arr[j], arr[i]];
    }
    return arr;
  }
}

export type SplitRatios = readonly [train: number, val: number, test: number];

export const DEFAULT_SPLIT_RATIOS: SplitRatios = [0.8, 0.1, 0.1];

export type SplitPools = {
  train: CanonicalRow[];
  val: CanonicalRow[];
  test: CanonicalRow[];
};

const RATIO_TOLERANCE = 1e-9;

export function assertValidRatios(ratios: SplitRatios): void {
  const problems: string[] = [];
  ratios.forEach((ratio, position) => {
    if (!Number.isFinite(ratio) || ratio < 0) {
      problems.push(`ratio #${position + 1} must be a finite number >= 0 (got ${ratio})`);
    }
  });
  const total = ratios.reduce((sum, ratio) => sum + ratio, 0);
  if (Math.abs(total - 1) > RATIO_TOLERANCE) {
    problems.push(`ratios must sum to 1 (got ${total})`);
  }
  if (problems.length > 0) {
    throw new CorpusPipelineError({
      code: "CONFIG_INVALID",
      stage: "split",
      reason: "Invalid split ratios.",
      details: problems,
    });
  }
}

function splitBucket<T>(bucket: readonly T[], ratios: SplitRatios): [T[], T[], T[]] {
  const n = bucket.length;
  const nTrain = Math.floor(n * ratios[0]);
  const nVal = Math.floor(n * ratios[1]);
  return [bucket.slice(0, nTrain), bucket.slice(nTrain, nTrain + nVal), bucket.slice(nTrain + nVal)];
}

/**
 * Class-stratified split driven by a caller-supplied generator. Positives are shuffled
 * first, then negatives, then train, val and test, all from the same generator state.
 */
export function splitWithRng(pool: RowPool, ratios: SplitRatios, rng: SeededRng): SplitPools {
  assertValidRatios(ratios);

  const positives = rng.shuffle(pool.filter((row) => row.target === 1));
  const negatives = rng.shuffle(pool.filter((row) => row.target === 0));

  const [pTrain, pVal, pTest] = splitBucket(positives, ratios);
  const [nTrain, nVal, nTest] = splitBucket(negatives, ratios);

  return {
    train: rng.shuffle([...pTrain, ...nTrain]),
    val: rng.shuffle([...pVal, ...nVal]),
    test: rng.shuffle([...pTest, ...nTest]),
  };
}

export function stratifiedSplit(
  pool: RowPool,
  seed: number,
  ratios: SplitRatios = DEFAULT_SPLIT_RATIOS
): SplitPools {
  return splitWithRng(pool, ratios, new SeededRng(seed));
}
