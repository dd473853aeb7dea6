import { z } from "zod";
import { invalidInput } from "./errors.js";

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

/** Timestamps are SQLite datetime('now') text: UTC, "YYYY-MM-DD HH:MM:SS". */
export interface DocumentRecord {
  id: number;
  title: string;
  authors: string;
  year: number | null;
  filePath: string;
  createdAt: string;
  updatedAt: string;
}

export interface CategoryRecord {
  id: number;
  name: string;
  parentId: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface NoteRecord {
  id: number;
  documentId: number;
  categoryId: number;
  excerpt: string;
  bodyMd: string;
  pageRef: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface NoteWithCategory extends NoteRecord {
  /** null only when the note was read through an outer join without a match. */
  categoryName: string | null;
}

export interface CategoryNode {
  category: CategoryRecord;
  children: CategoryNode[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Inputs
// ─────────────────────────────────────────────────────────────────────────────

const idSchema = z.number().int().positive();
const yearSchema = z.number().int();
/** Free text such as "12" or "12-14"; blank means no page. */
const pageRefSchema = z
  .string()
  .trim()
  .transform((v) => (v === "" ? null : v))
  .nullable();

export const newDocumentSchema = z.object({
  title: z.string().trim().min(1, "title is required"),
  filePath: z.string(),
  authors: z.string().default(""),
  year: yearSchema.nullable().default(null),
});

export const documentPatchSchema = z.object({
  title: z.string().trim().min(1, "title is required").optional(),
  filePath: z.string().optional(),
  authors: z.string().optional(),
  year: yearSchema.nullable().optional(),
});

export const newCategorySchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  parentId: idSchema.nullable().default(null),
});

export const categoryNameSchema = z.string().trim().min(1, "name is required");

export const newNoteSchema = z.object({
  documentId: idSchema,
  categoryId: idSchema,
  excerpt: z.string().default(""),
  bodyMd: z.string().default(""),
  pageRef: pageRefSchema.default(null),
});

export const recentLimitSchema = z.number().int().positive("limit must be a positive integer");

export const notePatchSchema = z.object({
  categoryId: idSchema.optional(),
  excerpt: z.string().optional(),
  bodyMd: z.string().optional(),
  pageRef: pageRefSchema.optional(),
});

export type NewDocument = z.input<typeof newDocumentSchema>;
export type DocumentPatch = z.input<typeof documentPatchSchema>;
export type NewCategory = z.input<typeof newCategorySchema>;
export type NewNote = z.input<typeof newNoteSchema>;
export type NotePatch = z.input<typeof notePatchSchema>;

/** Validate caller input, raising INVALID_INPUT with one line per issue. */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  what: string,
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw invalidInput(what, result.error);
  }
  return result.data;
}
