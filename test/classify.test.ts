import { test } from "tap";
import {
  classifyValue,
  valueSchema,
  toRawValue,
  DEFAULT_INTEGER_MAX,
  type ClassificationRule,
  type ValueKind,
} from "../src/classify/classify.js";
import { CHARSET_OPTIONS, DARK_THEME_OPTIONS } from "../src/classify/charsets.js";

test("classifyValue recognises booleans in any case", async (t) => {
  t.same(classifyValue("General", "bEnabled", "true"), { kind: "boolean" });
  t.same(classifyValue("General", "bEnabled", "FALSE"), { kind: "boolean" });
});

test("classifyValue recognises plain digits as bounded integers", async (t) => {
  t.same(classifyValue("General", "nCount", "42"), {
    kind: "integer",
    min: 0,
    max: DEFAULT_INTEGER_MAX,
  });
});

test("classifyValue falls back to text", async (t) => {
  t.same(classifyValue("General", "sName", "hello"), { kind: "text" });
  t.same(classifyValue("General", "fScale", "1.5"), { kind: "text" });
  t.same(classifyValue("General", "nOffset", "-5"), { kind: "text" });
  t.same(classifyValue("General", "sEmpty", ""), { kind: "text" });
});

test("classifyValue applies section overrides before heuristics", async (t) => {
  t.same(classifyValue("Hotkeys", "kSave", "83"), { kind: "text" });
  t.same(classifyValue("Log", "bEnabled", "true"), { kind: "text" });
});

test("classifyValue applies entry overrides in any section", async (t) => {
  t.same(classifyValue("Facegen", "uTintMaskResolution", "512"), { kind: "text" });

  const charset = classifyValue("General", "nCharset", "1");
  t.equal(charset.kind, "enum");
  if (charset.kind === "enum") {
    t.equal(charset.options.length, 19);
    t.same(charset.options[0], { label: "ANSI_CHARSET", value: "0" });
  }

  t.same(classifyValue("General", "uUIDarkThemeId", "1"), {
    kind: "enum",
    options: DARK_THEME_OPTIONS,
  });
});

test("classifyValue uses the first matching custom rule", async (t) => {
  const rules: ClassificationRule[] = [
    { kind: { kind: "integer", min: 0, max: 1 } },
    { section: "S", entry: "x", kind: { kind: "boolean" } },
    { entry: "x", kind: { kind: "integer", min: 1, max: 3 } },
  ];

  t.same(classifyValue("S", "x", "hello", rules), { kind: "boolean" });
  t.same(classifyValue("T", "x", "hello", rules), { kind: "integer", min: 1, max: 3 });
  t.same(classifyValue("T", "y", "hello", rules), { kind: "text" });
});

test("valueSchema for booleans", async (t) => {
  const schema = valueSchema({ kind: "boolean" });

  t.equal(schema.safeParse("True").success, true);
  t.equal(schema.safeParse("false").success, true);
  t.equal(schema.safeParse("yes").success, false);
});

test("valueSchema for integers checks digits and bounds", async (t) => {
  const schema = valueSchema({ kind: "integer", min: 0, max: DEFAULT_INTEGER_MAX });

  t.equal(schema.safeParse("999999").success, true);
  t.equal(schema.safeParse("0").success, true);
  t.equal(schema.safeParse("1000000").success, false);
  t.equal(schema.safeParse("1.5").success, false);
  t.equal(schema.safeParse("").success, false);

  const bounded = valueSchema({ kind: "integer", min: 2, max: 4 });
  const result = bounded.safeParse("5");
  t.equal(result.success, false);
  if (!result.success) {
    t.equal(result.error.issues[0]?.message, "Expected a number from 2 to 4");
  }
});

test("valueSchema for enums accepts option values only", async (t) => {
  const schema = valueSchema({ kind: "enum", options: CHARSET_OPTIONS });

  t.equal(schema.safeParse("204").success, true);
  t.equal(schema.safeParse("RUSSIAN_CHARSET").success, false);
  t.equal(schema.safeParse("3").success, false);
});

test("valueSchema for text rejects comment markers and line breaks", async (t) => {
  const schema = valueSchema({ kind: "text" });

  t.equal(schema.safeParse("C:\\Games\\Data").success, true);
  t.equal(schema.safeParse("a;b").success, false);
  t.equal(schema.safeParse("a\nb").success, false);
});

test("toRawValue converts control state to raw tokens", async (t) => {
  const bool: ValueKind = { kind: "boolean" };
  const int: ValueKind = { kind: "integer", min: 0, max: 10 };
  const text: ValueKind = { kind: "text" };

  t.equal(toRawValue(bool, true), "true");
  t.equal(toRawValue(bool, false), "false");
  t.equal(toRawValue(bool, "TRUE"), "true");
  t.equal(toRawValue(int, 7), "7");
  t.equal(toRawValue(int, 12.9), "12");
  t.equal(toRawValue(text, "Mixed Case"), "Mixed Case");
  t.throws(() => toRawValue(int, Number.NaN), { name: "RangeError" });
});
