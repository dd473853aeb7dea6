import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import path from "node:path";

import type { JournalMode } from "../config/schema.js";
import { createLogger } from "../utils/logger.js";
import { LIBRARY_SCHEMA_SQL } from "./schema.js";

const log = createLogger("library-db");

export interface OpenLibraryDbOptions {
  journalMode?: JournalMode;
}

function ensureDbDir(dbPath: string): void {
  if (dbPath === ":memory:") return;
  mkdirSync(path.dirname(dbPath), { recursive: true });
}

/**
 * Create any missing tables and indexes and enable foreign keys on this
 * connection. Safe to call on an initialized database.
 */
export function applySchema(db: Database.Database): void {
  db.exec(LIBRARY_SCHEMA_SQL);
  log.debug(`Library schema applied to ${db.name}`);
}

export function foreignKeysEnabled(db: Database.Database): boolean {
  return db.pragma("foreign_keys", { simple: true }) === 1;
}

export function openLibraryDb(
  dbPath: string,
  options: OpenLibraryDbOptions = {},
): Database.Database {
  ensureDbDir(dbPath);
  const db = new Database(dbPath);

  try {
    db.pragma("foreign_keys = ON");
    if (dbPath !== ":memory:") {
      const mode = options.journalMode ?? "wal";
      db.pragma(`journal_mode = ${mode === "wal" ? "WAL" : "DELETE"}`);
    }
    applySchema(db);
    return db;
  } catch (err) {
    db.close();
    throw err;
  }
}
