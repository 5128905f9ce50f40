import type { CanonicalRow } from "../schemas/canonical_row";

export type LabelDistribution = { "0": number; "1": number };

export function labelDistribution(pool: readonly Pick<CanonicalRow, "target">[]): LabelDistribution {
  const dist: LabelDistribution = { "0": 0, "1": 0 };
  for (const row of pool) {
    dist[row.target === 1 ? "1" : "0"] += 1;
  }
  return dist;
}

export function formatDistribution(dist: LabelDistribution): string {
  return `{0: ${dist["0"]}, 1: ${dist["1"]}}`;
}
