import { formatCweId } from "../extraction/cwe";
import { cleanCode, toIntLabel, toText } from "../extraction/text";
import {
  DEFAULT_LANGUAGE,
  EMPTY_LINE_INDEX,
  SENTINEL,
  type CanonicalRow,
  type Label,
} from "./canonical_row";

export type RawRow = Readonly<Record<string, unknown>>;
export type RawTable = readonly RawRow[];

function textOr(value: unknown, fallback: string): string {
  const text = toText(value);
  if (text === null || text.trim().length === 0) return fallback;
  return text;
}

/** Falls back to 0 when the cell is unparseable; "1.0"-style numeric text is accepted. */
export function coerceTarget(value: unknown): Label {
  const direct = toIntLabel(value);
  if (direct !== null) return direct;
  if (typeof value === "string" && value.trim().length > 0) {
    const numeric = Number(value.trim());
    if (numeric === 1) return 1;
  }
  return 0;
}

export function normalizeRow(raw: RawRow): CanonicalRow {
  return {
    processed_func: cleanCode(toText(raw.processed_func)),
    target: coerceTarget(raw.target),
    vul_func_with_fix: textOr(raw.vul_func_with_fix, SENTINEL),
    cve_id: textOr(raw.cve_id, SENTINEL),
    cwe_id: formatCweId(raw.cwe_id),
    commit_id: textOr(raw.commit_id, SENTINEL),
    file_path: textOr(raw.file_path, SENTINEL),
    file_language: textOr(raw.file_language, DEFAULT_LANGUAGE),
    flaw_line_index: textOr(raw.flaw_line_index, EMPTY_LINE_INDEX),
    flaw_line: toText(raw.flaw_line) ?? "",
  };
}

/**
 * Coerces any table into the canonical columns, in canonical order. Rows are neither
 * dropped nor reordered, and extra columns (a stale `index` included) are discarded.
 */
export function normalizeTable(table: RawTable): CanonicalRow[] {
  return table.map(normalizeRow);
}
