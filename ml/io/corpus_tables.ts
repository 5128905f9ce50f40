import {
  INDEXED_COLUMNS,
  IndexedRowSchema,
  type CanonicalRow,
  type IndexedRow,
} from "../schemas/canonical_row";
import { normalizeTable } from "../schemas/normalize";
import { CorpusPipelineError } from "../pipeline/errors";
import { readCsvTable, writeCsvTable } from "./csv_io";

export function readCanonicalPool(filePath: string, stage = "load"): CanonicalRow[] {
  return normalizeTable(readCsvTable(filePath, stage).rows);
}

export function assertIndexedPool(filePath: string, pool: readonly IndexedRow[]): void {
  const problems: string[] = [];
  pool.forEach((row, position) => {
    const parsed = IndexedRowSchema.safeParse(row);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`).join("; ");
      problems.push(`row ${position}: ${issues}`);
    } else if (row.index !== position) {
      problems.push(`row ${position}: index ${row.index} is out of sequence`);
    }
  });

  if (problems.length > 0) {
    throw new CorpusPipelineError({
      code: "OUTPUT_WRITE_FAILED",
      stage: "persist",
      reason: `Refusing to write ${filePath}: ${problems.length} row(s) violate the canonical schema.`,
      details: problems.slice(0, 20),
    });
  }
}

/**
 * Every row is checked against the canonical schema before anything is written.
 */
export function writeIndexedPool(filePath: string, pool: readonly IndexedRow[]): void {
  assertIndexedPool(filePath, pool);
  writeCsvTable(filePath, INDEXED_COLUMNS, pool);
}
