import type { LintResult, LintSummary, LintIssue } from "./lint.js";

/**
 * Options for formatting lint results.
 */
export interface FormatOptions {
  /** Use ANSI colors in output (default: true) */
  colors?: boolean;
  /** Omit files without issues (default: false) */
  onlyIssues?: boolean;
  /** Prefix stripped from file paths for shorter output */
  basePath?: string;
}

interface Palette {
  red: string;
  yellow: string;
  green: string;
  gray: string;
  bold: string;
  reset: string;
}

const ANSI: Palette = {
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  gray: "\x1b[90m",
  bold: "\x1b[1m",
  reset: "\x1b[0m",
};

const PLAIN: Palette = { red: "", yellow: "", green: "", gray: "", bold: "", reset: "" };

function paletteFor(options: FormatOptions): Palette {
  return (options.colors ?? true) ? ANSI : PLAIN;
}

function plural(count: number, word: string): string {
  return `${String(count)} ${word}${count === 1 ? "" : "s"}`;
}

function displayPath(path: string, basePath: string | undefined): string {
  if (!basePath || !path.startsWith(basePath)) {
    return path;
  }
  const stripped = path.slice(basePath.length);
  return stripped.startsWith("/") ? stripped.slice(1) : stripped;
}

/**
 * One issue as `  <line> <severity> <message> (<type>)`.
 */
function formatIssue(issue: LintIssue, c: Palette): string {
  const severity =
    issue.severity === "error"
      ? `${c.red}error${c.reset}`
      : `${c.yellow}warning${c.reset}`;
  const line = issue.location ? `${c.gray}${String(issue.location.line)}${c.reset} ` : "";
  return `  ${line}${severity} ${issue.message} ${c.gray}(${issue.type})${c.reset}`;
}

/**
 * Format the issues of one file, headed by its path. Returns "" for a clean
 * file.
 */
export function formatLintResult(result: LintResult, options: FormatOptions = {}): string {
  const issues = [...result.errors, ...result.warnings];
  if (issues.length === 0) {
    return "";
  }

  const c = paletteFor(options);
  return [
    `${c.bold}${displayPath(result.path, options.basePath)}${c.reset}`,
    ...issues.map((issue) => formatIssue(issue, c)),
    "",
  ].join("\n");
}

/**
 * Format all results followed by a summary line.
 */
export function formatLintResults(summary: LintSummary, options: FormatOptions = {}): string {
  const c = paletteFor(options);
  const blocks: string[] = [];

  for (const result of summary.results) {
    const formatted = formatLintResult(result, options);
    if (formatted) {
      blocks.push(formatted);
    } else if (!options.onlyIssues) {
      blocks.push(`${c.gray}${displayPath(result.path, options.basePath)}: ok${c.reset}`);
    }
  }

  const checked = plural(summary.filesChecked, "file");
  if (summary.totalErrors === 0 && summary.totalWarnings === 0) {
    blocks.push(`${c.green}✓${c.reset} ${checked} checked, no issues found`);
  } else {
    const counts = [
      summary.totalErrors > 0 ? `${c.red}${plural(summary.totalErrors, "error")}${c.reset}` : "",
      summary.totalWarnings > 0
        ? `${c.yellow}${plural(summary.totalWarnings, "warning")}${c.reset}`
        : "",
    ]
      .filter(Boolean)
      .join(" and ");
    blocks.push(`${checked} checked, ${counts}`);
  }

  return blocks.join("\n");
}

/**
 * Format lint results as JSON.
 */
export function formatLintResultsJson(summary: LintSummary): string {
  return JSON.stringify(summary, null, 2);
}
