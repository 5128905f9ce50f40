import crypto from "node:crypto";

import { cleanCode } from "../extraction/text";
import type { CanonicalRow, RowPool } from "../schemas/canonical_row";

function hashText(text: string) {
  return crypto.createHash("sha256").update(text, "utf8").digest("hex");
}

export function fingerprintCode(code: string): string {
  return hashText(cleanCode(code));
}

/** Only the code cell participates; label and metadata do not. */
export function fingerprintRow(row: CanonicalRow): string {
  return fingerprintCode(row.processed_func);
}

export function fingerprintSet(pool: RowPool): Set<string> {
  return new Set(pool.map(fingerprintRow));
}

/** Keeps the first occurrence of each fingerprint, in original order. */
export function dedupeRows(pool: RowPool): CanonicalRow[] {
  const seen = new Set<string>();
  const result: CanonicalRow[] = [];
  for (const row of pool) {
    const hash = fingerprintRow(row);
    if (seen.has(hash)) continue;
    seen.add(hash);
    result.push(row);
  }
  return result;
}

/** Drops every candidate whose fingerprint occurs in `reference`; `reference` is left alone. */
export function removeOverlap(reference: RowPool, candidates: RowPool): CanonicalRow[] {
  const referenceHashes = fingerprintSet(reference);
  return candidates.filter((row) => !referenceHashes.has(fingerprintRow(row)));
}

export function countSharedFingerprints(left: RowPool, right: RowPool): number {
  const leftHashes = fingerprintSet(left);
  return right.filter((row) => leftHashes.has(fingerprintRow(row))).length;
}
