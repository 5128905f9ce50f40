import type { CsvRow, CsvTable } from "../io/csv_io";
import { CorpusPipelineError } from "../pipeline/errors";

export type RowFilter = {
  column: string;
  value: string;
};

export type SelectOptions = {
  /** Sorted, unique 0-based data-row positions; null selects every row. */
  indices: readonly number[] | null;
  columns?: readonly string[];
  filter?: RowFilter;
};

function invalidIndices(text: string): CorpusPipelineError {
  return new CorpusPipelineError({
    code: "CONFIG_INVALID",
    stage: "select",
    reason: `Cannot read indices from "${text}".`,
    next_action: 'Pass "all", a list such as "[2, 67, 71]" or a comma list such as "2,67,71".',
  });
}

/**
 * `"all"` -> null; `"[2, 67, 71]"` or `"2,67,71"` -> sorted unique indices.
 */
export function parseIndices(text: string): number[] | null {
  const trimmed = text.trim();
  if (trimmed.toLowerCase() === "all") return null;

  const body = trimmed.replace(/^[[(]/, "").replace(/[\])]$/, "");
  const parts = body.split(",").map((part) => part.trim()).filter((part) => part.length > 0);

  const indices = parts.map((part) => {
    if (!/^\d+$/.test(part)) throw invalidIndices(text);
    return Number(part);
  });
  return [...new Set(indices)].sort((left, right) => left - right);
}

function assertColumns(table: CsvTable, columns: readonly string[]): void {
  const missing = columns.filter((column) => !table.header.includes(column));
  if (missing.length > 0) {
    throw new CorpusPipelineError({
      code: "INPUT_COLUMN_MISSING",
      stage: "select",
      reason: `Column(s) not in header${table.source ? ` of ${table.source}` : ""}: ${missing.join(", ")}`,
      details: [`header: ${table.header.join(", ")}`],
    });
  }
}

export function selectRows(table: CsvTable, options: SelectOptions): CsvTable {
  const columns = options.columns && options.columns.length > 0 ? [...options.columns] : [...table.header];
  assertColumns(table, options.filter ? [...columns, options.filter.column] : columns);

  const wanted = options.indices ? new Set(options.indices) : null;
  const rows: CsvRow[] = [];
  table.rows.forEach((row, position) => {
    if (wanted && !wanted.has(position)) return;
    if (options.filter && !(row[options.filter.column] ?? "").includes(options.filter.value)) return;
    const projected: CsvRow = {};
    for (const column of columns) {
      projected[column] = row[column] ?? "";
    }
    rows.push(projected);
  });

  return { header: columns, rows, source: table.source };
}
