import path from "node:path";

import { readCsvTable, writeCsvTable } from "../io/csv_io";
import { createCorpusLogger, type CorpusLogger } from "../logging/corpus_logger";
import { parseIndices, selectRows, type RowFilter } from "../lookup/select_rows";
import { CorpusPipelineError } from "./errors";
import { resolveSelectionPath } from "./paths";

export type SelectIndicesOptions = {
  csv_path: string;
  indices: string;
  /** Comma list of columns to keep; the full header when absent. */
  columns?: string;
  /** `column=value`: keep rows whose cell contains `value`. */
  filter?: string;
};

export function parseFilter(text: string | undefined): RowFilter | undefined {
  if (text === undefined || text.trim() === "") return undefined;
  const separator = text.indexOf("=");
  if (separator <= 0) {
    throw new CorpusPipelineError({
      code: "CONFIG_INVALID",
      stage: "select",
      reason: `Filter must look like column=value, got "${text}".`,
    });
  }
  return { column: text.slice(0, separator).trim(), value: text.slice(separator + 1) };
}

/**
 * Writes the selected rows as `<name>_selected_indices.csv` beside the input CSV.
 */
export function selectIndices(
  options: SelectIndicesOptions,
  logger: CorpusLogger = createCorpusLogger()
): { output: string; rows: number } {
  const csvPath = path.resolve(options.csv_path);
  const indices = parseIndices(options.indices);
  if (indices && indices.length === 0) {
    throw new CorpusPipelineError({
      code: "CONFIG_INVALID",
      stage: "select",
      reason: "No valid indices given.",
    });
  }

  const table = readCsvTable(csvPath, "select");
  const columns = options.columns
    ?.split(",")
    .map((column) => column.trim())
    .filter((column) => column.length > 0);
  const selected = selectRows(table, { indices, columns, filter: parseFilter(options.filter) });

  const missing = indices ? indices.filter((index) => index >= table.rows.length) : [];
  if (missing.length > 0) {
    logger.warn(`Indices past the last row (${table.rows.length - 1}): ${missing.join(", ")}`);
  }

  const output = resolveSelectionPath(csvPath);
  writeCsvTable(output, selected.header, selected.rows);
  logger.info(`Wrote ${selected.rows.length} row(s) to ${output}`);
  return { output, rows: selected.rows.length };
}
