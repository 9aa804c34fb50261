import type {
  ConfigDocument,
  ConfigEntry,
  ParsedDocument,
  SourceLocation,
} from "../document/types.js";
import { splitLines } from "../document/types.js";
import {
  COMMENT_MARKER,
  collectLeadingComment,
  isBlankLine,
  isCommentLine,
} from "./comments.js";

/**
 * Error thrown in strict mode for a `[` line that never closes.
 */
export class MalformedHeaderError extends Error {
  public readonly location: SourceLocation;

  constructor(message: string, source: string, line: number) {
    super(`${source}:${String(line)}: ${message}`);
    this.name = "MalformedHeaderError";
    this.location = { source, line };
  }
}

/**
 * Options for parsing.
 */
export interface ParseOptions {
  /** Source identifier used in error messages (default: "<input>") */
  source?: string;
  /**
   * Reject `[` lines without a closing `]` instead of skipping them
   * (default: false)
   */
  strict?: boolean;
}

interface MutableSection {
  name: string;
  comment: string;
  sourceLine: number;
  entries: ConfigEntry[];
}

/**
 * Whether a trimmed line is a `[name]` header.
 */
export function isSectionHeader(trimmed: string): boolean {
  return trimmed.startsWith("[") && trimmed.endsWith("]");
}

function joinComments(leading: string, inline: string): string {
  if (leading && inline) {
    return `${leading}\n${inline}`;
  }
  return leading || inline;
}

/**
 * Split an entry line into key, value and inline comment. The key ends at
 * the first `=`; the value ends at the first `;` after it.
 */
export function splitEntryLine(
  trimmed: string
): { name: string; value: string; inlineComment: string } {
  const eq = trimmed.indexOf("=");
  const name = trimmed.slice(0, eq).trim();
  let value = trimmed.slice(eq + 1).trim();
  let inlineComment = "";

  const marker = value.indexOf(COMMENT_MARKER);
  if (marker !== -1) {
    inlineComment = value.slice(marker + COMMENT_MARKER.length).trim();
    value = value.slice(0, marker).trim();
  }

  return { name, value, inlineComment };
}

/**
 * Parse configuration text into a document model paired with its raw lines.
 *
 * A single forward pass. Blank and comment lines are skipped but feed the
 * leading comment of the next header or entry. Entries before the first
 * header, unterminated headers and lines without `=` are dropped.
 *
 * @throws MalformedHeaderError for an unterminated header when `strict` is set
 */
export function parseDocument(
  text: string,
  options: ParseOptions = {}
): ParsedDocument {
  const source = options.source ?? "<input>";
  const strict = options.strict ?? false;
  const raw = splitLines(text);
  const sections: MutableSection[] = [];
  let current: MutableSection | undefined;

  raw.forEach((line, i) => {
    const trimmed = line.trim();
    if (isBlankLine(trimmed) || isCommentLine(trimmed)) {
      return;
    }

    if (isSectionHeader(trimmed)) {
      current = {
        name: trimmed.slice(1, -1),
        comment: collectLeadingComment(raw, i),
        sourceLine: i,
        entries: [],
      };
      sections.push(current);
      return;
    }

    if (strict && trimmed.startsWith("[")) {
      throw new MalformedHeaderError(
        `Unterminated section header "${trimmed}"`,
        source,
        i + 1
      );
    }

    if (trimmed.includes("=") && current) {
      const { name, value, inlineComment } = splitEntryLine(trimmed);
      current.entries.push({
        name,
        value,
        comment: joinComments(collectLeadingComment(raw, i), inlineComment),
        inlineComment,
        sourceLine: i,
      });
    }
  });

  const document: ConfigDocument = { sections };
  return { document, raw };
}

/**
 * Read and parse a file through a filesystem.
 */
export async function parseDocumentFile(
  fs: { read(path: string): Promise<string> },
  path: string,
  options: Omit<ParseOptions, "source"> = {}
): Promise<ParsedDocument> {
  const content = await fs.read(path);
  return parseDocument(content, { ...options, source: path });
}
