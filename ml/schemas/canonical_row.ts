import { z } from "zod";

export const CANONICAL_COLUMNS = [
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
] as const;

export const INDEXED_COLUMNS = ["index", ...CANONICAL_COLUMNS] as const;

export const SENTINEL = "-";
export const CWE_SENTINEL = "['-']";
export const DEFAULT_LANGUAGE = "C";
export const EMPTY_LINE_INDEX = "[]";

export const LabelSchema = z.union([z.literal(0), z.literal(1)]);
export type Label = z.infer<typeof LabelSchema>;

export const CweIdSchema = z.string().regex(/^\['(CWE-\d+|-)'\]$/, "cwe_id must look like ['CWE-<digits>'] or ['-']");

const CodeSchema = z
  .string()
  .refine((value) => value.trim().length > 0, "processed_func must not be empty")
  .refine((value) => !value.includes("\u0000"), "processed_func must not contain null bytes")
  .refine((value) => !value.includes("\r"), "processed_func must use \\n line endings");

export const CanonicalRowSchema = z.object({
  processed_func: CodeSchema,
  target: LabelSchema,
  vul_func_with_fix: z.string(),
  cve_id: z.string(),
  cwe_id: CweIdSchema,
  commit_id: z.string(),
  file_path: z.string(),
  file_language: z.string().min(1),
  flaw_line_index: z.string(),
  flaw_line: z.string(),
});
export type CanonicalRow = z.infer<typeof CanonicalRowSchema>;

export const IndexedRowSchema = CanonicalRowSchema.extend({
  index: z.number().int().nonnegative(),
});
export type IndexedRow = z.infer<typeof IndexedRowSchema>;

/**
 * One split (train/val/test) or one unsplit corpus. Stages never mutate a pool they
 * received; they return a new one.
 */
export type RowPool = readonly CanonicalRow[];

export type SplitName = "train" | "val" | "test";
