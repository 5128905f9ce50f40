import { CWE_SENTINEL } from "../schemas/canonical_row";

const CWE_PATTERN = /(CWE-\d+)/i;

export function extractCweToken(value: unknown): string | null {
  if (Array.isArray(value)) {
    for (const item of value) {
      const token = extractCweToken(item);
      if (token) return token;
    }
    return null;
  }
  if (typeof value !== "string" && typeof value !== "number") return null;
  const match = CWE_PATTERN.exec(String(value));
  return match ? match[1].toUpperCase() : null;
}

/** `"CWE-119 (Buffer Overflow)"` -> `"['CWE-119']"`; no token -> `"['-']"`. */
export function formatCweId(value: unknown): string {
  const token = extractCweToken(value);
  return token ? `['${token}']` : CWE_SENTINEL;
}
