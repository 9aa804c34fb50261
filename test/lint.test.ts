import { test } from "tap";
import {
  lintText,
  lintFile,
  lintFiles,
  formatLintResult,
  formatLintResults,
  formatLintResultsJson,
  type LintSummary,
} from "../src/lint/index.js";
import { MemoryFileSystem } from "../src/fs/memory-fs.js";

const MESSY = ["K=v", "[S]", "A=1", "A=2", "stray", "[Broken", "[S]", "A=3", ""].join("\n");

test("lintText: clean file has no issues", async (t) => {
  const result = lintText("; c\n[S]\nA=1\n\n[T]\nA=1\n", "clean.ini");

  t.equal(result.path, "clean.ini");
  t.same(result.errors, []);
  t.same(result.warnings, []);
});

test("lintText: reports every skipped or repeated line", async (t) => {
  const result = lintText(MESSY, "messy.ini");

  t.same(
    result.warnings.map((w) => [w.type, w.location?.line]),
    [
      ["orphan-entry", 1],
      ["duplicate-key", 4],
      ["stray-line", 5],
      ["unterminated-header", 6],
      ["duplicate-section", 7],
    ]
  );
  t.equal(result.errors.length, 0);
});

test("lintText: messages name the first occurrence", async (t) => {
  const result = lintText(MESSY, "messy.ini");

  t.equal(result.warnings[1]?.message, 'Duplicate key "A" in [S] (first defined at line 3)');
  t.equal(result.warnings[4]?.message, "Duplicate section [S] (first defined at line 2)");
  t.same(result.warnings[0]?.location, { source: "messy.ini", line: 1 });
});

test("lintText: keys repeat freely across sections", async (t) => {
  const result = lintText("[S]\nA=1\n[T]\nA=1\n", "a.ini");

  t.same(result.warnings, []);
});

test("lintFile: unreadable file is an error", async (t) => {
  const fs = new MemoryFileSystem();

  const result = await lintFile(fs, "/nope.ini");

  t.equal(result.errors.length, 1);
  t.equal(result.errors[0]?.type, "io");
  t.equal(result.errors[0]?.message, "File not found: /nope.ini");
});

test("lintFiles: summarises results", async (t) => {
  const fs = new MemoryFileSystem({
    "/p/clean.ini": "[S]\nA=1\n",
    "/p/messy.ini": MESSY,
  });

  const summary = await lintFiles(fs, ["/p/clean.ini", "/p/messy.ini", "/p/gone.ini"]);

  t.equal(summary.filesChecked, 3);
  t.equal(summary.totalErrors, 1);
  t.equal(summary.totalWarnings, 5);
  t.equal(summary.filesWithErrors, 1);
});

test("formatLintResult: plain output with base path stripped", async (t) => {
  const output = formatLintResult(
    {
      path: "/p/a.ini",
      errors: [],
      warnings: [
        {
          type: "stray-line",
          severity: "warning",
          message: "Line is not a header, entry or comment: stray",
          location: { source: "/p/a.ini", line: 5 },
        },
      ],
    },
    { colors: false, basePath: "/p" }
  );

  t.equal(
    output,
    "a.ini\n  5 warning Line is not a header, entry or comment: stray (stray-line)\n"
  );
});

test("formatLintResult: clean file formats as empty string", async (t) => {
  t.equal(formatLintResult({ path: "a.ini", errors: [], warnings: [] }), "");
});

test("formatLintResults: clean summary", async (t) => {
  const summary: LintSummary = {
    results: [{ path: "a.ini", errors: [], warnings: [] }],
    totalErrors: 0,
    totalWarnings: 0,
    filesChecked: 1,
    filesWithErrors: 0,
  };

  t.equal(
    formatLintResults(summary, { colors: false }),
    "a.ini: ok\n✓ 1 file checked, no issues found"
  );
  t.equal(
    formatLintResults(summary, { colors: false, onlyIssues: true }),
    "✓ 1 file checked, no issues found"
  );
});

test("formatLintResults: counts errors and warnings", async (t) => {
  const summary: LintSummary = {
    results: [
      {
        path: "b.ini",
        errors: [{ type: "io", severity: "error", message: "File not found: b.ini" }],
        warnings: [],
      },
    ],
    totalErrors: 1,
    totalWarnings: 2,
    filesChecked: 2,
    filesWithErrors: 1,
  };

  t.equal(
    formatLintResults(summary, { colors: false, onlyIssues: true }),
    "b.ini\n  error File not found: b.ini (io)\n\n2 files checked, 1 error and 2 warnings"
  );
});

test("formatLintResultsJson: round-trips through JSON", async (t) => {
  const summary = await lintFiles(new MemoryFileSystem({ "/a.ini": "x\n" }), ["/a.ini"]);

  t.same(JSON.parse(formatLintResultsJson(summary)), summary);
});

test("lintText: a bracketed key with = is an entry, not a header", async (t) => {
  t.same(lintText("[S]\n[x=1\n", "a.ini").warnings, []);

  const result = lintText("[S]\n[x=1\n[x=2\n", "a.ini");
  t.same(
    result.warnings.map((w) => [w.type, w.location?.line]),
    [["duplicate-key", 3]]
  );
  t.equal(result.warnings[0]?.message, 'Duplicate key "[x" in [S] (first defined at line 2)');
});
