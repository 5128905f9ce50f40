import type { Label } from "../schemas/canonical_row";
import { asList, cleanCode, isRecord, toIntLabel } from "./text";

/**
 * `function_before` / `function_after` arrive as an object, a one-element list of objects, or a
 * bare string. Only the first list element is ever read.
 */
export type CodeSlot =
  | { kind: "record"; value: Record<string, unknown> }
  | { kind: "text"; value: string }
  | { kind: "absent" };

export function toCodeSlot(raw: unknown): CodeSlot {
  const first = asList(raw)[0];
  if (isRecord(first)) return { kind: "record", value: first };
  if (typeof first === "string") return { kind: "text", value: first };
  return { kind: "absent" };
}

export type ExtractionInput = {
  detail: Record<string, unknown>;
  parent: Record<string, unknown> | null;
  before: CodeSlot;
  after: CodeSlot;
};

export type FallbackRule<T> = {
  name: string;
  applies: (input: ExtractionInput) => boolean;
  read: (input: ExtractionInput) => T | null;
};

export type Resolved<T> = { value: T; rule: string };

export function resolveFirst<T>(rules: readonly FallbackRule<T>[], input: ExtractionInput): Resolved<T> | null {
  for (const rule of rules) {
    if (!rule.applies(input)) continue;
    const value = rule.read(input);
    if (value !== null) return { value, rule: rule.name };
  }
  return null;
}

function codeOrNull(value: unknown): string | null {
  const code = cleanCode(value);
  return code.length > 0 ? code : null;
}

function slotField(slot: "before" | "after", field: string): FallbackRule<string> {
  const source = slot === "before" ? "function_before" : "function_after";
  return {
    name: `${source}.${field}`,
    applies: (input) => input[slot].kind === "record",
    read: (input) => {
      const current = input[slot];
      return current.kind === "record" ? codeOrNull(current.value[field]) : null;
    },
  };
}

function slotText(slot: "before" | "after"): FallbackRule<string> {
  const source = slot === "before" ? "function_before" : "function_after";
  return {
    name: `${source}<text>`,
    applies: (input) => input[slot].kind === "text",
    read: (input) => {
      const current = input[slot];
      return current.kind === "text" ? codeOrNull(current.value) : null;
    },
  };
}

function detailField(field: string): FallbackRule<string> {
  return {
    name: `detail.${field}`,
    applies: (input) => field in input.detail,
    read: (input) => codeOrNull(input.detail[field]),
  };
}

export const BEFORE_CODE_RULES: readonly FallbackRule<string>[] = [
  slotField("before", "function"),
  slotField("before", "code_before"),
  slotField("before", "code"),
  slotText("before"),
  detailField("code_before"),
  detailField("code"),
];

export const LABEL_RULES: readonly FallbackRule<Label>[] = [
  {
    name: "function_before.target",
    applies: (input) => input.before.kind === "record",
    read: (input) => (input.before.kind === "record" ? toIntLabel(input.before.value.target) : null),
  },
  {
    name: "detail.target",
    applies: (input) => "target" in input.detail,
    read: (input) => toIntLabel(input.detail.target),
  },
  {
    name: "parent.target",
    applies: (input) => input.parent !== null && "target" in input.parent,
    read: (input) => (input.parent ? toIntLabel(input.parent.target) : null),
  },
];

export const AFTER_CODE_RULES: readonly FallbackRule<string>[] = [
  slotField("after", "function"),
  slotField("after", "code"),
  slotText("after"),
  detailField("patch"),
];

export type Extraction = {
  before_code: string;
  label: Label | null;
  after_code: string;
  resolved_by: {
    before: string | null;
    label: string | null;
    after: string | null;
  };
};

export function extractCodeAndLabel(
  detail: Record<string, unknown>,
  parent: Record<string, unknown> | null = null
): Extraction {
  const input: ExtractionInput = {
    detail,
    parent,
    before: toCodeSlot(detail.function_before),
    after: toCodeSlot(detail.function_after),
  };

  const before = resolveFirst(BEFORE_CODE_RULES, input);
  const label = resolveFirst(LABEL_RULES, input);
  const after = resolveFirst(AFTER_CODE_RULES, input);
  const beforeCode = before?.value ?? "";

  return {
    before_code: beforeCode,
    label: label?.value ?? null,
    // Without a fix the vulnerable body is repeated so the column is never blank.
    after_code: after?.value ?? beforeCode,
    resolved_by: {
      before: before?.rule ?? null,
      label: label?.rule ?? null,
      after: after?.rule ?? null,
    },
  };
}
