// ini-inplace - comment-preserving structured editing for INI files

// Document model
export {
  type RawDocument,
  type ConfigEntry,
  type ConfigSection,
  type ConfigDocument,
  type ParsedDocument,
  type SourceLocation,
  type Edits,
  lookupEdit,
  splitLines,
  findEntry,
} from "./document/types.js";

// Parser
export {
  parseDocument,
  parseDocumentFile,
  MalformedHeaderError,
  type ParseOptions,
} from "./parser/parse.js";
export {
  collectLeadingComment,
  stripCommentMarker,
  COMMENT_MARKER,
} from "./parser/comments.js";

// Writer
export {
  renderDocument,
  renderLines,
  DocumentMismatchError,
  INLINE_COMMENT_SEPARATOR,
} from "./serialize/render.js";

// Schema
export {
  ConfigEntrySchema,
  ConfigSectionSchema,
  ConfigDocumentSchema,
  EditsSchema,
  type EditsInput,
} from "./schema/base.js";

// Value classification
export {
  classifyValue,
  valueSchema,
  toRawValue,
  DEFAULT_RULES,
  DEFAULT_INTEGER_MAX,
  type ValueKind,
  type EnumOption,
  type ClassificationRule,
} from "./classify/classify.js";
export { CHARSET_OPTIONS, DARK_THEME_OPTIONS } from "./classify/charsets.js";

// Filesystem
export { type FileSystem, IoError } from "./fs/types.js";
export { NodeFileSystem } from "./fs/node-fs.js";
export { MemoryFileSystem } from "./fs/memory-fs.js";

// Session
export {
  ConfigSession,
  FileNameError,
  UnknownEntryError,
  ValueValidationError,
  type SessionOptions,
} from "./session/session.js";

// Lint
export {
  lintText,
  lintFile,
  lintFiles,
  formatLintResult,
  formatLintResults,
  formatLintResultsJson,
  type LintIssue,
  type LintResult,
  type LintSummary,
  type FormatOptions,
} from "./lint/index.js";
