/**
 * The literal source lines of a configuration file, indexed by 0-based
 * physical line number. Each line keeps its own terminator, so joining the
 * array reproduces the source text exactly.
 */
export type RawDocument = readonly string[];

/**
 * One `key=value` line inside a section.
 */
export interface ConfigEntry {
  /** Key text, trimmed */
  readonly name: string;
  /** Raw value text, trimmed, without any inline comment */
  readonly value: string;
  /** Leading comment block and inline comment, newline-joined */
  readonly comment: string;
  /** Text after the first `;` on the entry's own line */
  readonly inlineComment: string;
  /** 0-based index into the RawDocument this entry was parsed from */
  readonly sourceLine: number;
}

/**
 * A `[name]` header and the entries that follow it.
 */
export interface ConfigSection {
  readonly name: string;
  readonly comment: string;
  readonly sourceLine: number;
  readonly entries: readonly ConfigEntry[];
}

export interface ConfigDocument {
  readonly sections: readonly ConfigSection[];
}

/**
 * A document model together with the raw lines it was derived from.
 * Write-back is addressed by line index, so the two are only meaningful as a pair.
 */
export interface ParsedDocument {
  readonly document: ConfigDocument;
  readonly raw: RawDocument;
}

/**
 * Position of a line in a named source, for diagnostics.
 */
export interface SourceLocation {
  /** Source file or identifier */
  source: string;
  /** Line number (1-based) */
  line: number;
}

/**
 * New values keyed by section name, then entry name.
 */
export type Edits = Readonly<Record<string, Readonly<Record<string, string>>>>;

/**
 * Look up the edit for an entry. Only own properties count, so section or
 * key names such as "constructor" never resolve to inherited members.
 */
export function lookupEdit(
  edits: Edits,
  sectionName: string,
  entryName: string
): string | undefined {
  if (!Object.hasOwn(edits, sectionName)) {
    return undefined;
  }
  const sectionEdits = edits[sectionName];
  if (sectionEdits === undefined || !Object.hasOwn(sectionEdits, entryName)) {
    return undefined;
  }
  return sectionEdits[entryName];
}

/**
 * Split text into physical lines, keeping each line's terminator.
 */
export function splitLines(text: string): RawDocument {
  const lines: string[] = [];
  let start = 0;
  while (start < text.length) {
    const newline = text.indexOf("\n", start);
    if (newline === -1) {
      lines.push(text.slice(start));
      break;
    }
    lines.push(text.slice(start, newline + 1));
    start = newline + 1;
  }
  return lines;
}

/**
 * Find an entry by section and key. When either name repeats, the last
 * occurrence wins.
 */
export function findEntry(
  document: ConfigDocument,
  sectionName: string,
  entryName: string
): ConfigEntry | undefined {
  let found: ConfigEntry | undefined;
  for (const section of document.sections) {
    if (section.name !== sectionName) continue;
    for (const entry of section.entries) {
      if (entry.name === entryName) {
        found = entry;
      }
    }
  }
  return found;
}
