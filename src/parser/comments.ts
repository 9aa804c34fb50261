/** Marker that starts a full-line or trailing comment. */
export const COMMENT_MARKER = ";";

/**
 * Whether a line is a full-line comment (ignoring surrounding whitespace).
 */
export function isCommentLine(line: string): boolean {
  return line.trim().startsWith(COMMENT_MARKER);
}

/**
 * Whether a line is empty or whitespace only.
 */
export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Remove one comment marker and trim what remains.
 * `";;  x"` becomes `";  x"`; only the first marker goes.
 */
export function stripCommentMarker(line: string): string {
  const trimmed = line.trim();
  const body = trimmed.startsWith(COMMENT_MARKER)
    ? trimmed.slice(COMMENT_MARKER.length)
    : trimmed;
  return body.trim();
}

/**
 * Collect the comment block directly above `index`.
 *
 * Walks backward from the previous line. Blank lines are skipped without
 * ending the walk; the first line that is neither blank nor a comment does.
 * The comment texts come back in top-to-bottom order, newline-joined.
 *
 * @param lines - The raw lines of the document
 * @param index - 0-based index of the header or entry line
 */
export function collectLeadingComment(
  lines: readonly string[],
  index: number
): string {
  const comments: string[] = [];
  for (let i = index - 1; i >= 0; i--) {
    const line = lines[i] ?? "";
    if (isCommentLine(line)) {
      comments.push(stripCommentMarker(line));
    } else if (!isBlankLine(line)) {
      break;
    }
  }
  return comments.reverse().join("\n");
}
