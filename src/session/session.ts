import type { ZodError } from "zod";
import type {
  ConfigDocument,
  ConfigEntry,
  Edits,
  ParsedDocument,
  RawDocument,
} from "../document/types.js";
import { findEntry, lookupEdit } from "../document/types.js";
import type { FileSystem } from "../fs/types.js";
import { parseDocument, type ParseOptions } from "../parser/parse.js";
import { renderDocument } from "../serialize/render.js";
import { EditsSchema } from "../schema/base.js";
import {
  classifyValue,
  toRawValue,
  valueSchema,
  DEFAULT_RULES,
  type ClassificationRule,
  type ValueKind,
} from "../classify/classify.js";

/**
 * Error thrown when a file does not carry the name the session requires.
 */
export class FileNameError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly expected: string
  ) {
    super(message);
    this.name = "FileNameError";
  }
}

/**
 * Error thrown when an edit names an entry the document does not have.
 */
export class UnknownEntryError extends Error {
  constructor(
    public readonly section: string,
    public readonly entry: string
  ) {
    super(`No entry "${entry}" in [${section}]`);
    this.name = "UnknownEntryError";
  }
}

/**
 * Error thrown when an edited value is not valid for its kind.
 */
export class ValueValidationError extends Error {
  constructor(
    message: string,
    public readonly section: string,
    public readonly entry: string,
    public readonly zodError: ZodError
  ) {
    super(message);
    this.name = "ValueValidationError";
  }
}

/**
 * Options for opening a session.
 */
export interface SessionOptions {
  /** Only accept files with this base name (default: any name) */
  expectedFileName?: string;
  /** Validate edited values against their kind (default: true) */
  validate?: boolean;
  /** Classification overrides (default: DEFAULT_RULES) */
  rules?: readonly ClassificationRule[];
  /** Parse options applied on load and after each save */
  parse?: Omit<ParseOptions, "source">;
}

function basename(path: string): string {
  const lastSlash = Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\"));
  return lastSlash === -1 ? path : path.slice(lastSlash + 1);
}

function checkFileName(path: string, expected: string | undefined): void {
  if (expected !== undefined && basename(path) !== expected) {
    throw new FileNameError(
      `File name must be "${expected}", got "${basename(path)}"`,
      path,
      expected
    );
  }
}

/**
 * Editing state for one configuration file: the parsed baseline and the
 * values changed since it was loaded or last saved.
 *
 * The baseline pair is never modified; pending values are kept apart and
 * only reach the file through `save`.
 */
export class ConfigSession {
  private pending = new Map<string, Map<string, string>>();
  private savesInFlight = 0;
  private readonly fs: FileSystem;
  private readonly validate: boolean;
  private readonly rules: readonly ClassificationRule[];

  private constructor(
    fs: FileSystem,
    private currentPath: string,
    private baseline: ParsedDocument,
    private loadTime: Date,
    private readonly options: SessionOptions
  ) {
    this.fs = fs;
    this.validate = options.validate ?? true;
    this.rules = options.rules ?? DEFAULT_RULES;
  }

  /**
   * Read and parse a file into a new session.
   *
   * @throws FileNameError if `expectedFileName` is set and does not match
   * @throws IoError if the file cannot be read
   */
  static async open(
    fs: FileSystem,
    path: string,
    options: SessionOptions = {}
  ): Promise<ConfigSession> {
    checkFileName(path, options.expectedFileName);
    const content = await fs.read(path);
    const parsed = parseDocument(content, { ...options.parse, source: path });
    return new ConfigSession(fs, path, parsed, new Date(), options);
  }

  get path(): string {
    return this.currentPath;
  }

  get document(): ConfigDocument {
    return this.baseline.document;
  }

  get raw(): RawDocument {
    return this.baseline.raw;
  }

  get loadedAt(): Date {
    return this.loadTime;
  }

  private entry(section: string, name: string): ConfigEntry {
    const entry = findEntry(this.baseline.document, section, name);
    if (!entry) {
      throw new UnknownEntryError(section, name);
    }
    return entry;
  }

  /**
   * Current value of an entry: the pending edit if any, else the parsed value.
   */
  get(section: string, name: string): string | undefined {
    const pending = this.pending.get(section)?.get(name);
    if (pending !== undefined) {
      return pending;
    }
    return findEntry(this.baseline.document, section, name)?.value;
  }

  /**
   * Control kind for an entry, judged from its parsed value.
   *
   * @throws UnknownEntryError if the entry does not exist
   */
  kindOf(section: string, name: string): ValueKind {
    return classifyValue(section, name, this.entry(section, name).value, this.rules);
  }

  /**
   * Resolve an entry and check a candidate value for it. The value already
   * in the file is always accepted, even when it falls outside its kind.
   */
  private check(section: string, name: string, value: string): ConfigEntry {
    const entry = this.entry(section, name);
    if (!this.validate || value === entry.value) {
      return entry;
    }

    const kind = classifyValue(section, name, entry.value, this.rules);
    const result = valueSchema(kind).safeParse(value);
    if (!result.success) {
      const reason = result.error.issues.map((i) => i.message).join("; ");
      throw new ValueValidationError(
        `Invalid value for ${name} in [${section}]: ${reason}`,
        section,
        name,
        result.error
      );
    }
    return entry;
  }

  /**
   * Record a new raw value for an entry. Setting the parsed value again
   * drops the pending edit, except while a save is running: the baseline
   * is about to change, so the value is kept until the save settles.
   *
   * @throws UnknownEntryError if the entry does not exist
   * @throws ValueValidationError if validation is on and the value does not fit its kind
   */
  set(section: string, name: string, value: string): void {
    const entry = this.check(section, name, value);

    const sectionEdits = this.pending.get(section) ?? new Map<string, string>();
    if (value === entry.value && this.savesInFlight === 0) {
      sectionEdits.delete(name);
    } else {
      sectionEdits.set(name, value);
    }

    if (sectionEdits.size > 0) {
      this.pending.set(section, sectionEdits);
    } else {
      this.pending.delete(section);
    }
  }

  /**
   * Record the state of an editor control (checkbox, number field, choice
   * or text field) as the entry's new value.
   */
  setFromControl(section: string, name: string, input: boolean | number | string): void {
    this.set(section, name, toRawValue(this.kindOf(section, name), input));
  }

  /**
   * Apply a batch of edits from untyped input. The batch is checked in
   * full before any value is recorded.
   *
   * @throws ZodError if the input is not `{ section: { key: value } }`
   */
  applyEdits(input: unknown): void {
    const edits = EditsSchema.parse(input);
    const flat = Object.entries(edits).flatMap(([section, values]) =>
      Object.entries(values).map(([name, value]) => ({ section, name, value }))
    );

    for (const { section, name, value } of flat) {
      this.check(section, name, value);
    }
    for (const { section, name, value } of flat) {
      this.set(section, name, value);
    }
  }

  /**
   * Snapshot of the pending edits.
   */
  edits(): Edits {
    const snapshot: Record<string, Record<string, string>> = {};
    for (const [section, values] of this.pending) {
      snapshot[section] = Object.fromEntries(values);
    }
    return snapshot;
  }

  isDirty(): boolean {
    return this.pending.size > 0;
  }

  /**
   * Drop all pending edits.
   */
  discard(): void {
    this.pending.clear();
  }

  /**
   * The content `save` would write.
   */
  render(): string {
    return renderDocument(this.baseline.raw, this.edits(), this.baseline.document);
  }

  /**
   * Write the pending edits. On success the written text becomes the new
   * baseline and the written edits are cleared; edits recorded while the
   * write was running stay pending on top of it. On failure nothing changes.
   *
   * @param path - Save to a different file instead (also becomes the session's path)
   * @throws FileNameError if `path` breaks the expected file name
   * @throws IoError if the file cannot be written
   */
  async save(path?: string): Promise<void> {
    const target = path ?? this.currentPath;
    checkFileName(target, this.options.expectedFileName);

    const written = this.edits();
    const content = renderDocument(this.baseline.raw, written, this.baseline.document);

    this.savesInFlight++;
    try {
      await this.fs.write(target, content);
    } finally {
      this.savesInFlight--;
    }

    this.baseline = parseDocument(content, { ...this.options.parse, source: target });
    this.currentPath = target;
    this.loadTime = new Date();
    this.rebasePending(written);
  }

  /**
   * Drop pending values that the baseline now holds: those written by a
   * save and still unchanged, and those equal to the new parsed value.
   */
  private rebasePending(written: Edits): void {
    for (const [section, values] of this.pending) {
      for (const [name, value] of values) {
        const savedValue = lookupEdit(written, section, name);
        const current = findEntry(this.baseline.document, section, name)?.value;
        if (value === savedValue || value === current) {
          values.delete(name);
        }
      }
      if (values.size === 0) {
        this.pending.delete(section);
      }
    }
  }

  /**
   * Check if the file on disk changed since it was loaded or saved
   * (also true if it no longer exists).
   */
  async isStale(): Promise<boolean> {
    try {
      const stat = await this.fs.stat(this.currentPath);
      return stat.mtime > this.loadTime;
    } catch {
      // File may have been deleted
      return true;
    }
  }
}
