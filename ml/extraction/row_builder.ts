import {
  DEFAULT_LANGUAGE,
  EMPTY_LINE_INDEX,
  SENTINEL,
  type CanonicalRow,
} from "../schemas/canonical_row";
import { extractCweToken, formatCweId } from "./cwe";
import { extractCodeAndLabel } from "./extract";
import { asList, isRecord, pickText } from "./text";

export type RowBuildCounters = {
  skip_no_details: number;
  skip_detail_not_dict: number;
  skip_lang_mismatch: number;
  skip_no_code: number;
  skip_no_label: number;
  kept: number;
};

export type SkipReason = Exclude<keyof RowBuildCounters, "kept">;

export type RowBuildOptions = {
  /** Exact, case-insensitive match on the resolved file language. */
  filter_lang?: string;
  onSkip?: (reason: SkipReason, subject: unknown) => void;
};

export function createRowBuildCounters(): RowBuildCounters {
  return {
    skip_no_details: 0,
    skip_detail_not_dict: 0,
    skip_lang_mismatch: 0,
    skip_no_code: 0,
    skip_no_label: 0,
    kept: 0,
  };
}

function resolveLanguage(detail: Record<string, unknown>, parent: Record<string, unknown>): string {
  return pickText(detail.file_language, parent.cve_language) ?? DEFAULT_LANGUAGE;
}

/** The detail's CWE wins only when it carries a `CWE-<digits>` token. */
function resolveCwe(detail: Record<string, unknown>, parent: Record<string, unknown>): string {
  return formatCweId(extractCweToken(detail.cwe_id) ?? extractCweToken(parent.cwe_id));
}

/**
 * Builds the rows of one source object. The caller owns `counters`; each skipped detail
 * bumps exactly one of them.
 */
export function* buildRowsFromRecord(
  record: unknown,
  counters: RowBuildCounters,
  options: RowBuildOptions = {}
): Generator<CanonicalRow, void, undefined> {
  const skip = (reason: SkipReason, subject: unknown) => {
    counters[reason] += 1;
    options.onSkip?.(reason, subject);
  };

  const details = isRecord(record) ? record.details : undefined;
  if (!isRecord(record) || details === null || details === undefined) {
    skip("skip_no_details", record);
    return;
  }

  const wantedLang = options.filter_lang?.trim().toLowerCase();

  for (const detail of asList(details)) {
    if (!isRecord(detail)) {
      skip("skip_detail_not_dict", detail);
      continue;
    }

    const language = resolveLanguage(detail, record);
    if (wantedLang && language.toLowerCase() !== wantedLang) {
      skip("skip_lang_mismatch", detail);
      continue;
    }

    const extraction = extractCodeAndLabel(detail, record);
    if (!extraction.before_code) {
      skip("skip_no_code", detail);
      continue;
    }
    if (extraction.label === null) {
      skip("skip_no_label", detail);
      continue;
    }

    counters.kept += 1;
    yield {
      processed_func: extraction.before_code,
      target: extraction.label,
      vul_func_with_fix: extraction.after_code || SENTINEL,
      cve_id: pickText(detail.cve_id, record.cve_id) ?? SENTINEL,
      cwe_id: resolveCwe(detail, record),
      commit_id: pickText(detail.commit_id, record.commit_id) ?? SENTINEL,
      file_path: pickText(detail.file_path) ?? SENTINEL,
      file_language: language,
      flaw_line_index: EMPTY_LINE_INDEX,
      flaw_line: "",
    };
  }
}

/**
 * Lazily turns source objects into canonical rows. Consumes `records` once; the counters
 * are the generator's return value.
 */
export function* buildRows(
  records: Iterable<unknown>,
  options: RowBuildOptions = {}
): Generator<CanonicalRow, RowBuildCounters, undefined> {
  const counters = createRowBuildCounters();
  for (const record of records) {
    yield* buildRowsFromRecord(record, counters, options);
  }
  return counters;
}

export function collectRows(
  records: Iterable<unknown>,
  options: RowBuildOptions = {}
): { rows: CanonicalRow[]; counters: RowBuildCounters } {
  const rows: CanonicalRow[] = [];
  const iterator = buildRows(records, options);
  for (;;) {
    const step = iterator.next();
    if (step.done) return { rows, counters: step.value };
    rows.push(step.value);
  }
}
