/**
 * Library store: one SQLite connection with the document, category and
 * note repositories bound to it.
 */

import type Database from "better-sqlite3";

import type { JournalMode } from "../config/schema.js";
import { createLogger } from "../utils/logger.js";
import { createCategoryRepo, type CategoryRepo } from "./categories.js";
import { openLibraryDb } from "./db.js";
import { createDocumentRepo, type DocumentRepo } from "./documents.js";
import { createNoteRepo, type NoteRepo } from "./notes.js";

const log = createLogger("library");

export interface LibraryStoreConfig {
  /** Path to SQLite database file, or ":memory:" */
  sqlitePath: string;
  /** Journal mode for file databases (default: wal) */
  journalMode?: JournalMode;
}

export interface LibraryStats {
  documents: number;
  categories: number;
  notes: number;
}

export interface LibraryStore {
  readonly db: Database.Database;
  readonly path: string;
  documents: DocumentRepo;
  categories: CategoryRepo;
  notes: NoteRepo;
  /** Run several repository calls atomically. */
  transaction<T>(fn: () => T): T;
  stats(): LibraryStats;
  close(): void;
}

export function createLibraryStore(config: LibraryStoreConfig): LibraryStore {
  const db = openLibraryDb(config.sqlitePath, { journalMode: config.journalMode });
  log.debug(`Opened library at ${config.sqlitePath}`);

  const documents = createDocumentRepo(db);
  const categories = createCategoryRepo(db);
  const notes = createNoteRepo(db);

  return {
    db,
    path: config.sqlitePath,
    documents,
    categories,
    notes,

    transaction<T>(fn: () => T): T {
      return db.transaction(fn)();
    },

    stats() {
      return {
        documents: documents.count(),
        categories: categories.count(),
        notes: notes.count(),
      };
    },

    close() {
      db.close();
    },
  };
}
