export {
  lintText,
  lintFile,
  lintFiles,
  type LintIssue,
  type LintResult,
  type LintSummary,
} from "./lint.js";

export {
  formatLintResult,
  formatLintResults,
  formatLintResultsJson,
  type FormatOptions,
} from "./format.js";
