import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CorpusPipelineError } from "../../pipeline/errors";
import { assertIndexedPool, readCanonicalPool, writeIndexedPool } from "../corpus_tables";
import { parseCsv, readCsvTable, serializeCsv, writeCsvTable } from "../csv_io";
import { createJsonlReadStats, parseJsonlLines, readFileLines, readJsonlRecords } from "../jsonl";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "corpus-io-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("csv io", () => {
  it("round-trips cells with newlines, quotes and commas", () => {
    const filePath = path.join(tmpDir, "nested", "table.csv");
    const rows = [
      { processed_func: 'int f() {\n  puts("a, b");\n}', target: "1" },
      { processed_func: "int g;", target: "0" },
    ];

    writeCsvTable(filePath, ["processed_func", "target"], rows);
    const table = readCsvTable(filePath);

    expect(table.header).toEqual(["processed_func", "target"]);
    expect(table.rows).toEqual(rows);
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(["table.csv"]);
  });

  it("writes the header in the given order and blanks for absent cells", () => {
    expect(serializeCsv(["b", "a"], [{ a: 1, c: 3 }])).toBe("b,a\n,1\n");
  });

  it("trims header names and strips a BOM", () => {
    const table = parseCsv("\uFEFF code , target\nx,1\n");

    expect(table.header).toEqual(["code", "target"]);
    expect(table.rows).toEqual([{ code: "x", target: "1" }]);
  });

  it("fails with INPUT_MISSING for an absent file", () => {
    expect(() => readCsvTable(path.join(tmpDir, "missing.csv"))).toThrowError(/Input file not found/);
  });
});

describe("jsonl io", () => {
  it("skips blank lines and counts malformed ones", () => {
    const stats = createJsonlReadStats();
    const records = [...parseJsonlLines('{"a":1}\n\n{broken\n  {"b":2}  \n', stats)];

    expect(records).toEqual([{ a: 1 }, { b: 2 }]);
    expect(stats).toEqual({ lines: 3, skip_malformed_json: 1 });
  });

  it("reads from disk", () => {
    const filePath = path.join(tmpDir, "records.jsonl");
    fs.writeFileSync(filePath, '{"details":[]}\r\n{"details":null}\r\n');
    const stats = createJsonlReadStats();

    expect([...readJsonlRecords(filePath, stats)]).toEqual([{ details: [] }, { details: null }]);
  });

  it("joins lines split across read chunks", () => {
    const filePath = path.join(tmpDir, "chunked.jsonl");
    const long = { code: "int f() { return 1; }", note: "é".repeat(10) };
    fs.writeFileSync(filePath, `${JSON.stringify(long)}\r\n{oops\n\n{"b":2}`);
    const stats = createJsonlReadStats();

    expect([...readJsonlRecords(filePath, stats, { chunkSize: 7 })]).toEqual([long, { b: 2 }]);
    expect(stats).toEqual({ lines: 3, skip_malformed_json: 1 });
  });

  it("yields raw lines without their terminators", () => {
    const filePath = path.join(tmpDir, "lines.txt");
    fs.writeFileSync(filePath, "ab\r\ncdef\n\ng");

    expect([...readFileLines(filePath, 3)]).toEqual(["ab", "cdef", "", "g"]);
  });

  it("fails before reading when the file is missing", () => {
    const stats = createJsonlReadStats();

    try {
      readJsonlRecords(path.join(tmpDir, "absent.jsonl"), stats, { stage: "load" });
      expect.unreachable();
    } catch (error) {
      expect(error instanceof CorpusPipelineError ? [error.code, error.stage] : null).toEqual(["INPUT_MISSING", "load"]);
    }
  });
});

describe("corpus tables", () => {
  const row = {
    index: 0,
    processed_func: "int a;",
    target: 1 as const,
    vul_func_with_fix: "-",
    cve_id: "-",
    cwe_id: "['-']",
    commit_id: "-",
    file_path: "-",
    file_language: "C",
    flaw_line_index: "[]",
    flaw_line: "",
  };

  it("writes indexed rows that read back as canonical rows", () => {
    const filePath = path.join(tmpDir, "train.csv");
    writeIndexedPool(filePath, [row, { ...row, index: 1, processed_func: "int b;", target: 0 }]);

    expect(fs.readFileSync(filePath, "utf8").split("\n")[0]).toBe(
      "index,processed_func,target,vul_func_with_fix,cve_id,cwe_id,commit_id,file_path,file_language,flaw_line_index,flaw_line"
    );
    const { index: _index, ...canonical } = row;
    expect(readCanonicalPool(filePath)).toEqual([canonical, { ...canonical, processed_func: "int b;", target: 0 }]);
  });

  it("refuses pools with gaps in the index or schema violations", () => {
    const filePath = path.join(tmpDir, "bad.csv");

    expect(() => assertIndexedPool(filePath, [{ ...row, index: 1 }])).toThrowError(/violate the canonical schema/);
    expect(() => writeIndexedPool(filePath, [{ ...row, cwe_id: "CWE-1" }])).toThrowError(CorpusPipelineError);
    expect(fs.existsSync(filePath)).toBe(false);
  });
});
