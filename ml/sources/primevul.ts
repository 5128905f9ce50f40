import { formatCweId } from "../extraction/cwe";
import { cleanCode, isRecord, toIntLabel, toText } from "../extraction/text";
import {
  DEFAULT_LANGUAGE,
  EMPTY_LINE_INDEX,
  SENTINEL,
  type CanonicalRow,
} from "../schemas/canonical_row";

export const CPP_MARKERS = [
  "::",
  "template<",
  "std::",
  "using namespace",
  "new ",
  "delete ",
  "noexcept",
  "nullptr",
  "friend ",
  "virtual ",
  "public:",
  "private:",
  "protected:",
  "constexpr",
  "decltype",
  "typename",
  "explicit",
  "mutable",
  "static_cast<",
  "dynamic_cast<",
  "reinterpret_cast<",
  "const_cast<",
] as const;

const REQUIRED_PUNCTUATION = ["(", ")", "{", "}"] as const;

export type PrimevulCounters = {
  total: number;
  skip_malformed_json: number;
  skip_not_c: number;
  skip_no_label: number;
  kept: number;
};

export function createPrimevulCounters(): PrimevulCounters {
  return { total: 0, skip_malformed_json: 0, skip_not_c: 0, skip_no_label: 0, kept: 0 };
}

/** Case-insensitive substring match; errs towards rejecting. */
export function looksLikeCpp(func: string): boolean {
  const lower = func.toLowerCase();
  return CPP_MARKERS.some((marker) => lower.includes(marker));
}

export function isCFunction(func: string): boolean {
  if (func.length === 0) return false;
  if (looksLikeCpp(func)) return false;
  return REQUIRED_PUNCTUATION.every((token) => func.includes(token));
}

function textOrSentinel(value: unknown): string {
  const text = toText(value);
  return text !== null && text.trim().length > 0 ? text.trim() : SENTINEL;
}

/**
 * Flat `{ func, target, cve, cwe, commit_id, file_name }` record to a canonical row, or null
 * when the record is skipped (counted in `counters`).
 */
export function mapPrimevulRecord(record: unknown, counters: PrimevulCounters): CanonicalRow | null {
  if (!isRecord(record) || typeof record.func !== "string" || !isCFunction(record.func)) {
    counters.skip_not_c += 1;
    return null;
  }
  const code = cleanCode(record.func);
  if (!code) {
    counters.skip_not_c += 1;
    return null;
  }
  const target = toIntLabel(record.target);
  if (target === null) {
    counters.skip_no_label += 1;
    return null;
  }

  counters.kept += 1;
  return {
    processed_func: code,
    target,
    vul_func_with_fix: SENTINEL,
    cve_id: textOrSentinel(record.cve),
    cwe_id: formatCweId(record.cwe),
    commit_id: textOrSentinel(record.commit_id),
    file_path: textOrSentinel(record.file_name),
    file_language: DEFAULT_LANGUAGE,
    flaw_line_index: EMPTY_LINE_INDEX,
    flaw_line: "",
  };
}

export function collectPrimevulRows(records: Iterable<unknown>, counters: PrimevulCounters): CanonicalRow[] {
  const rows: CanonicalRow[] = [];
  for (const record of records) {
    const row = mapPrimevulRecord(record, counters);
    if (row) rows.push(row);
  }
  return rows;
}
