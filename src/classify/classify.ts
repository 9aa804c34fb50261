import { z, type ZodType } from "zod";
import { CHARSET_OPTIONS, DARK_THEME_OPTIONS } from "./charsets.js";

/**
 * One choice of an enumerated value: a display label and the raw token
 * written to the file.
 */
export interface EnumOption {
  label: string;
  value: string;
}

/** Upper bound offered for numeric values without a specific rule. */
export const DEFAULT_INTEGER_MAX = 999999;

/**
 * The kind of editor control a value calls for.
 */
export type ValueKind =
  | { kind: "boolean" }
  | { kind: "integer"; min: number; max: number }
  | { kind: "enum"; options: readonly EnumOption[] }
  | { kind: "text" };

/**
 * A per-field override. Matches when every name it specifies is equal;
 * a rule that specifies neither never matches.
 */
export interface ClassificationRule {
  section?: string;
  entry?: string;
  kind: ValueKind;
}

const TEXT: ValueKind = { kind: "text" };

/**
 * Overrides for fields whose values look numeric or boolean but are not
 * edited as such. Checked in order before any heuristic.
 */
export const DEFAULT_RULES: readonly ClassificationRule[] = [
  { section: "Hotkeys", kind: TEXT },
  { section: "Log", kind: TEXT },
  { entry: "uTintMaskResolution", kind: TEXT },
  { entry: "nCharset", kind: { kind: "enum", options: CHARSET_OPTIONS } },
  { entry: "uUIDarkThemeId", kind: { kind: "enum", options: DARK_THEME_OPTIONS } },
];

function ruleMatches(rule: ClassificationRule, section: string, entry: string): boolean {
  if (rule.section === undefined && rule.entry === undefined) {
    return false;
  }
  return (
    (rule.section === undefined || rule.section === section) &&
    (rule.entry === undefined || rule.entry === entry)
  );
}

/**
 * Pick the control kind for a value. Rules win over heuristics; without a
 * matching rule, `true`/`false` (any case) is boolean, plain digits are an
 * integer, and anything else is text.
 */
export function classifyValue(
  section: string,
  entry: string,
  value: string,
  rules: readonly ClassificationRule[] = DEFAULT_RULES
): ValueKind {
  const rule = rules.find((r) => ruleMatches(r, section, entry));
  if (rule) {
    return rule.kind;
  }

  const lower = value.toLowerCase();
  if (lower === "true" || lower === "false") {
    return { kind: "boolean" };
  }
  if (/^[0-9]+$/.test(value)) {
    return { kind: "integer", min: 0, max: DEFAULT_INTEGER_MAX };
  }
  return TEXT;
}

/**
 * Schema accepting the raw values that are valid for a kind.
 */
export function valueSchema(kind: ValueKind): ZodType<string> {
  switch (kind.kind) {
    case "boolean":
      return z.string().regex(/^(true|false)$/i, { message: "Expected true or false" });
    case "integer": {
      const { min, max } = kind;
      return z
        .string()
        .regex(/^[0-9]+$/, { message: "Expected a whole number" })
        .refine(
          (v) => {
            const n = Number(v);
            return n >= min && n <= max;
          },
          { message: `Expected a number from ${String(min)} to ${String(max)}` }
        );
    }
    case "enum": {
      const allowed = kind.options.map((o) => o.value);
      return z.string().refine((v) => allowed.includes(v), {
        message: `Expected one of ${allowed.join(", ")}`,
      });
    }
    case "text":
      return z
        .string()
        .refine((v) => !/[\r\n]/.test(v), { message: "Value must fit on one line" })
        .refine((v) => !v.includes(";"), {
          message: 'Value cannot contain ";", which starts a comment',
        });
  }
}

/**
 * Turn the state of an editor control into the raw token to write.
 */
export function toRawValue(kind: ValueKind, input: boolean | number | string): string {
  if (typeof input === "boolean") {
    return input ? "true" : "false";
  }
  if (typeof input === "number") {
    if (!Number.isFinite(input)) {
      throw new RangeError(`Cannot store ${String(input)} as a value`);
    }
    return String(Math.trunc(input));
  }
  return kind.kind === "boolean" ? input.toLowerCase() : input;
}
