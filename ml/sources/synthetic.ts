import { formatCweId } from "../extraction/cwe";
import { cleanCode, toIntLabel } from "../extraction/text";
import type { CsvTable } from "../io/csv_io";
import { CorpusPipelineError } from "../pipeline/errors";
import {
  CWE_SENTINEL,
  DEFAULT_LANGUAGE,
  EMPTY_LINE_INDEX,
  SENTINEL,
  type CanonicalRow,
  type Label,
} from "../schemas/canonical_row";
import { normalizeTable } from "../schemas/normalize";

export const SYNTH_CODE_COLUMNS = ["processed_func", "code"] as const;
export type SynthCodeColumn = (typeof SYNTH_CODE_COLUMNS)[number];

export type SyntheticCounters = {
  vuln_rows: number;
  nonvuln_rows: number;
  skip_incomplete: number;
  skip_no_code: number;
  kept: number;
};

export type SyntheticTables = {
  vuln: CsvTable;
  nonvuln: CsvTable;
  keep_only_complete?: boolean;
};

export function selectCodeColumn(table: CsvTable): SynthCodeColumn {
  const column = SYNTH_CODE_COLUMNS.find((name) => table.header.includes(name));
  if (!column) {
    throw new CorpusPipelineError({
      code: "INPUT_COLUMN_MISSING",
      stage: "synthetic",
      reason: `Synthetic CSV must contain 'processed_func' or 'code'${table.source ? ` (${table.source})` : ""}.`,
      details: [`header: ${table.header.join(", ")}`],
    });
  }
  return column;
}

function isComplete(value: unknown): boolean {
  return toIntLabel(value) === 1;
}

function mapTable(
  table: CsvTable,
  target: Label,
  keepOnlyComplete: boolean,
  counters: SyntheticCounters
): CanonicalRow[] {
  const codeColumn = selectCodeColumn(table);
  const filterComplete = keepOnlyComplete && table.header.includes("is_complete");
  const hasCwe = target === 1 && table.header.includes("cwe");
  const rows: CanonicalRow[] = [];

  for (const raw of table.rows) {
    if (filterComplete && !isComplete(raw.is_complete)) {
      counters.skip_incomplete += 1;
      continue;
    }
    const code = cleanCode(raw[codeColumn]);
    if (!code) {
      counters.skip_no_code += 1;
      continue;
    }
    rows.push({
      processed_func: code,
      target,
      vul_func_with_fix: SENTINEL,
      cve_id: SENTINEL,
      cwe_id: hasCwe ? formatCweId(raw.cwe) : CWE_SENTINEL,
      commit_id: SENTINEL,
      file_path: SENTINEL,
      file_language: DEFAULT_LANGUAGE,
      flaw_line_index: EMPTY_LINE_INDEX,
      flaw_line: "",
    });
  }
  return rows;
}

/**
 * Maps the generator's two tables onto canonical rows. Labels come from which table a row
 * sits in, never from a column: vulnerable rows are 1, non-vulnerable rows 0.
 */
export function buildSyntheticPool(input: SyntheticTables): { rows: CanonicalRow[]; counters: SyntheticCounters } {
  const counters: SyntheticCounters = {
    vuln_rows: input.vuln.rows.length,
    nonvuln_rows: input.nonvuln.rows.length,
    skip_incomplete: 0,
    skip_no_code: 0,
    kept: 0,
  };
  const keepOnlyComplete = input.keep_only_complete ?? false;

  const mapped = [
    ...mapTable(input.vuln, 1, keepOnlyComplete, counters),
    ...mapTable(input.nonvuln, 0, keepOnlyComplete, counters),
  ];
  const rows = normalizeTable(mapped);
  counters.kept = rows.length;
  return { rows, counters };
}
