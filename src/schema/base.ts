import { z } from "zod";

/**
 * Schema for a single parsed entry.
 */
export const ConfigEntrySchema = z.object({
  name: z.string(),
  value: z.string(),
  comment: z.string(),
  inlineComment: z.string(),
  sourceLine: z.number().int().nonnegative(),
});

/**
 * Schema for a section header and its entries.
 */
export const ConfigSectionSchema = z.object({
  name: z.string(),
  comment: z.string(),
  sourceLine: z.number().int().nonnegative(),
  entries: z.array(ConfigEntrySchema),
});

export const ConfigDocumentSchema = z.object({
  sections: z.array(ConfigSectionSchema),
});

/**
 * Schema for edit input arriving untyped, e.g. JSON posted back by a form:
 * `{ [section]: { [key]: newValue } }`.
 */
export const EditsSchema = z.record(z.string(), z.record(z.string(), z.string()));

export type EditsInput = z.infer<typeof EditsSchema>;
