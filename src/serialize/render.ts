import type { ConfigDocument, Edits, RawDocument } from "../document/types.js";
import { lookupEdit } from "../document/types.js";

/** Separator placed between a rewritten value and its inline comment. */
export const INLINE_COMMENT_SEPARATOR = "\t\t\t; ";

/**
 * Error thrown when a document model points at a line its raw document
 * does not have, i.e. the model was paired with the wrong raw lines.
 */
export class DocumentMismatchError extends Error {
  constructor(
    message: string,
    public readonly section: string,
    public readonly entry: string,
    public readonly sourceLine: number,
    public readonly lineCount: number
  ) {
    super(message);
    this.name = "DocumentMismatchError";
  }
}

/**
 * Leading whitespace of a line, exactly as written.
 */
function indentationOf(line: string): string {
  return /^[^\S\r\n]*/.exec(line)?.[0] ?? "";
}

function terminatorOf(line: string): string {
  if (line.endsWith("\r\n")) return "\r\n";
  return "\n";
}

/**
 * Build the replacement for an edited entry line, keeping the original
 * indentation, inline comment and line terminator.
 */
export function rewriteEntryLine(
  original: string,
  name: string,
  value: string,
  inlineComment: string
): string {
  const comment = inlineComment ? `${INLINE_COMMENT_SEPARATOR}${inlineComment}` : "";
  return `${indentationOf(original)}${name}=${value}${comment}${terminatorOf(original)}`;
}

/**
 * Apply edits to a copy of the raw lines. Only the lines of edited entries
 * change; everything else is returned verbatim. Edits naming entries the
 * document does not have are ignored.
 *
 * @param raw - The raw lines the document was parsed from (not modified)
 * @param edits - New values keyed by section, then entry
 * @param document - The model parsed from `raw`
 * @returns A new array of raw lines
 * @throws DocumentMismatchError if an edited entry's line is outside `raw`
 */
export function renderLines(
  raw: RawDocument,
  edits: Edits,
  document: ConfigDocument
): RawDocument {
  const lines = [...raw];

  for (const section of document.sections) {
    for (const entry of section.entries) {
      const value = lookupEdit(edits, section.name, entry.name);
      if (value === undefined) {
        continue;
      }

      const original = Number.isInteger(entry.sourceLine) ? lines[entry.sourceLine] : undefined;
      if (original === undefined) {
        throw new DocumentMismatchError(
          `Entry "${entry.name}" in [${section.name}] points at line ${String(entry.sourceLine)}, but the document has ${String(lines.length)} lines`,
          section.name,
          entry.name,
          entry.sourceLine,
          lines.length
        );
      }

      lines[entry.sourceLine] = rewriteEntryLine(
        original,
        entry.name,
        value,
        entry.inlineComment
      );
    }
  }

  return lines;
}

/**
 * Apply edits and join the result into file content.
 */
export function renderDocument(
  raw: RawDocument,
  edits: Edits,
  document: ConfigDocument
): string {
  return renderLines(raw, edits, document).join("");
}
