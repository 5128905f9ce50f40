import { describe, expect, it } from "vitest";

import { CanonicalRowSchema } from "../canonical_row";
import { coerceTarget, normalizeRow, normalizeTable } from "../normalize";

describe("normalizeRow", () => {
  it("fills absent fields with their sentinels", () => {
    expect(normalizeRow({ processed_func: "int x;", target: "1" })).toEqual({
      processed_func: "int x;",
      target: 1,
      vul_func_with_fix: "-",
      cve_id: "-",
      cwe_id: "['-']",
      commit_id: "-",
      file_path: "-",
      file_language: "C",
      flaw_line_index: "[]",
      flaw_line: "",
    });
  });

  it("drops extra columns and a stale index", () => {
    const row = normalizeRow({ index: "17", processed_func: "a", target: 0, extra: "x" });

    expect(Object.keys(row)).toEqual([
      "processed_func",
      "target",
      "vul_func_with_fix",
      "cve_id",
      "cwe_id",
      "commit_id",
      "file_path",
      "file_language",
      "flaw_line_index",
      "flaw_line",
    ]);
  });

  it("cleans code and canonicalizes cwe", () => {
    const row = normalizeRow({ processed_func: "a\r\nb\u0000 ", target: 1, cwe_id: "cwe-79" });

    expect(row.processed_func).toBe("a\nb");
    expect(row.cwe_id).toBe("['CWE-79']");
  });

  it("keeps flaw_line text as given", () => {
    expect(normalizeRow({ processed_func: "a", flaw_line: "  x = 1;" }).flaw_line).toBe("  x = 1;");
  });
});

describe("coerceTarget", () => {
  it("accepts numeric label text and defaults the rest to 0", () => {
    expect(coerceTarget("1.0")).toBe(1);
    expect(coerceTarget(" true ")).toBe(1);
    expect(coerceTarget("")).toBe(0);
    expect(coerceTarget("2")).toBe(0);
    expect(coerceTarget(null)).toBe(0);
  });
});

describe("normalizeTable", () => {
  const table = [
    { processed_func: " int a; ", target: "1", cwe_id: "CWE-119 (Buffer Overflow)", flaw_line_index: "" },
    { processed_func: "int b;", target: false, cve_id: "", file_language: "cpp", extra: 1 },
    { processed_func: "", target: "x" },
  ];

  it("is idempotent", () => {
    const once = normalizeTable(table);
    expect(normalizeTable(once)).toEqual(once);
  });

  it("neither drops nor reorders rows", () => {
    expect(normalizeTable(table).map((row) => row.processed_func)).toEqual(["int a;", "int b;", ""]);
  });

  it("emits rows that satisfy the schema once code is present", () => {
    const rows = normalizeTable(table).filter((row) => row.processed_func.length > 0);
    for (const row of rows) {
      expect(CanonicalRowSchema.safeParse(row).success).toBe(true);
    }
  });
});
