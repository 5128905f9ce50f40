import type { Label } from "../schemas/canonical_row";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asList(value: unknown): unknown[] {
  if (value === null || value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Strips null bytes, folds CRLF / CR into LF and trims. Non-string values carry no code.
 */
export function cleanCode(value: unknown): string {
  if (typeof value !== "string" || value.length === 0) return "";
  return value
    .replace(/\u0000/g, "")
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .trim();
}

export function toIntLabel(value: unknown): Label | null {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number") {
    if (value === 0) return 0;
    if (value === 1) return 1;
    return null;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "0" || normalized === "false") return 0;
    if (normalized === "1" || normalized === "true") return 1;
  }
  return null;
}

/**
 * Scalar-to-text coercion for metadata cells. Objects and absent values yield null.
 */
export function toText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (Array.isArray(value)) return JSON.stringify(value);
  return null;
}

export function pickText(...values: unknown[]): string | null {
  for (const value of values) {
    const text = toText(value);
    if (text !== null && text.trim().length > 0) return text.trim();
  }
  return null;
}
