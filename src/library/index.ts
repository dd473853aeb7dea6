/**
 * Library module exports.
 */

export { applySchema, foreignKeysEnabled, openLibraryDb, type OpenLibraryDbOptions } from "./db.js";
export { LIBRARY_INDEXES, LIBRARY_SCHEMA_SQL, LIBRARY_TABLES } from "./schema.js";
export { LibraryError, type LibraryErrorCode } from "./errors.js";
export {
  createLibraryStore,
  type LibraryStats,
  type LibraryStore,
  type LibraryStoreConfig,
} from "./store.js";
export type { DocumentRepo } from "./documents.js";
export type { CategoryRemoval, CategoryRepo } from "./categories.js";
export type { NoteRepo } from "./notes.js";
export { buildCategoryTree, formatCategoryTree } from "./tree.js";
export { formatPageRef, parsePageRef, type PageRange } from "./page-ref.js";
export {
  DEFAULT_SEED,
  PLACEHOLDER_DOCUMENT_TITLE,
  ensureDefaultCategories,
  getDefaultIds,
  seedMinimalData,
  type SeedOptions,
  type SeedResult,
} from "./seed.js";
export type {
  CategoryNode,
  CategoryRecord,
  DocumentPatch,
  DocumentRecord,
  NewCategory,
  NewDocument,
  NewNote,
  NotePatch,
  NoteRecord,
  NoteWithCategory,
} from "./types.js";
