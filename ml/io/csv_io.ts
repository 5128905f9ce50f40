import fs from "node:fs";
import path from "node:path";

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import { CorpusPipelineError } from "../pipeline/errors";

export type CsvRow = Record<string, string>;

export type CsvTable = {
  header: string[];
  rows: CsvRow[];
  source?: string;
};

export function assertInputExists(filePath: string, stage: string): void {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new CorpusPipelineError({
      code: "INPUT_MISSING",
      stage,
      reason: `Input file not found: ${filePath}`,
    });
  }
}

export function parseCsv(raw: string, source?: string): CsvTable {
  let header: string[] = [];
  const rows = parse(raw, {
    bom: true,
    columns: (record: string[]) => {
      header = record.map((value) => value.trim());
      return header;
    },
    skip_empty_lines: true,
  }) as CsvRow[];
  return { header, rows, source };
}

export function readCsvTable(filePath: string, stage = "load"): CsvTable {
  assertInputExists(filePath, stage);
  return parseCsv(fs.readFileSync(filePath, "utf8"), filePath);
}

export function serializeCsv(header: readonly string[], rows: readonly Record<string, unknown>[]): string {
  const records = rows.map((row) => header.map((column) => {
    const value = row[column];
    return value === null || value === undefined ? "" : String(value);
  }));
  return stringify([header.slice(), ...records]);
}

/**
 * Serializes the whole table first, then writes a sibling temp file and renames it into
 * place, so a failed run never leaves a truncated CSV behind.
 */
export function writeCsvTable(
  filePath: string,
  header: readonly string[],
  rows: readonly Record<string, unknown>[]
): void {
  const content = serializeCsv(header, rows);
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tmpPath, content, "utf8");
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    fs.rmSync(tmpPath, { force: true });
    throw new CorpusPipelineError({
      code: "OUTPUT_WRITE_FAILED",
      stage: "persist",
      reason: `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
}
