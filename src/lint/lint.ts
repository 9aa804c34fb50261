import type { SourceLocation } from "../document/types.js";
import { splitLines } from "../document/types.js";
import type { FileSystem } from "../fs/types.js";
import { isBlankLine, isCommentLine } from "../parser/comments.js";
import { isSectionHeader, splitEntryLine } from "../parser/parse.js";

/**
 * A lint issue (error or warning).
 */
export interface LintIssue {
  type:
    | "io"
    | "orphan-entry"
    | "unterminated-header"
    | "stray-line"
    | "duplicate-section"
    | "duplicate-key";
  severity: "error" | "warning";
  message: string;
  location?: SourceLocation;
}

/**
 * Result of linting a single file.
 */
export interface LintResult {
  path: string;
  errors: LintIssue[];
  warnings: LintIssue[];
}

/**
 * Summary of all lint results.
 */
export interface LintSummary {
  results: LintResult[];
  totalErrors: number;
  totalWarnings: number;
  filesChecked: number;
  filesWithErrors: number;
}

/**
 * Report the lines the parser skips and the names it lets repeat.
 * Nothing here is fatal for parsing, so every finding is a warning.
 */
export function lintText(text: string, source: string): LintResult {
  const warnings: LintIssue[] = [];
  const lines = splitLines(text);
  const sectionLines = new Map<string, number>();
  let keyLines: Map<string, number> | undefined;
  let sectionName = "";

  lines.forEach((line, i) => {
    const trimmed = line.trim();
    const location = { source, line: i + 1 };
    if (isBlankLine(trimmed) || isCommentLine(trimmed)) {
      return;
    }

    if (isSectionHeader(trimmed)) {
      sectionName = trimmed.slice(1, -1);
      const first = sectionLines.get(sectionName);
      if (first !== undefined) {
        warnings.push({
          type: "duplicate-section",
          severity: "warning",
          message: `Duplicate section [${sectionName}] (first defined at line ${String(first)})`,
          location,
        });
      } else {
        sectionLines.set(sectionName, i + 1);
      }
      keyLines = new Map();
      return;
    }

    if (trimmed.startsWith("[") && !trimmed.includes("=")) {
      warnings.push({
        type: "unterminated-header",
        severity: "warning",
        message: `Section header is missing "]": ${trimmed}`,
        location,
      });
      return;
    }

    if (!trimmed.includes("=")) {
      warnings.push({
        type: "stray-line",
        severity: "warning",
        message: `Line is not a header, entry or comment: ${trimmed}`,
        location,
      });
      return;
    }

    const { name } = splitEntryLine(trimmed);
    if (!keyLines) {
      warnings.push({
        type: "orphan-entry",
        severity: "warning",
        message: `Entry "${name}" appears before any section and is ignored`,
        location,
      });
      return;
    }

    const first = keyLines.get(name);
    if (first !== undefined) {
      warnings.push({
        type: "duplicate-key",
        severity: "warning",
        message: `Duplicate key "${name}" in [${sectionName}] (first defined at line ${String(first)})`,
        location,
      });
    } else {
      keyLines.set(name, i + 1);
    }
  });

  return { path: source, errors: [], warnings };
}

/**
 * Lint a single configuration file.
 */
export async function lintFile(fs: FileSystem, path: string): Promise<LintResult> {
  let text: string;
  try {
    text = await fs.read(path);
  } catch (e) {
    return {
      path,
      errors: [
        {
          type: "io",
          severity: "error",
          message: e instanceof Error ? e.message : String(e),
        },
      ],
      warnings: [],
    };
  }
  return lintText(text, path);
}

/**
 * Lint a list of configuration files.
 */
export async function lintFiles(fs: FileSystem, paths: string[]): Promise<LintSummary> {
  const results: LintResult[] = [];
  let totalErrors = 0;
  let totalWarnings = 0;
  let filesWithErrors = 0;

  for (const path of paths) {
    const result = await lintFile(fs, path);
    results.push(result);

    totalErrors += result.errors.length;
    totalWarnings += result.warnings.length;

    if (result.errors.length > 0) {
      filesWithErrors++;
    }
  }

  return {
    results,
    totalErrors,
    totalWarnings,
    filesChecked: results.length,
    filesWithErrors,
  };
}
