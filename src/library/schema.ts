/**
 * Library schema: documents, a self-referencing category tree, and notes
 * owned by one document and one category.
 *
 * Every statement is guarded by IF NOT EXISTS, so applying it to an
 * initialized database is a no-op. `PRAGMA foreign_keys` is per connection
 * and is not stored in the file; it is part of the script so each apply
 * turns enforcement on for the connection that runs it.
 */
export const LIBRARY_SCHEMA_SQL = `
PRAGMA foreign_keys = ON;

-- Imported documents; the file itself lives outside the database
CREATE TABLE IF NOT EXISTS documents (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  title TEXT NOT NULL,
  authors TEXT NOT NULL DEFAULT '',
  year INTEGER,
  file_path TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Category tree via parent_id; removing a node removes its subtree
CREATE TABLE IF NOT EXISTS categories (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  parent_id INTEGER,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  FOREIGN KEY (parent_id) REFERENCES categories(id) ON DELETE CASCADE
);

-- Each note belongs to exactly one document and one category
CREATE TABLE IF NOT EXISTS notes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  document_id INTEGER NOT NULL,
  category_id INTEGER NOT NULL,
  excerpt TEXT NOT NULL DEFAULT '',
  body_md TEXT NOT NULL DEFAULT '',
  page_ref TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE,
  FOREIGN KEY (category_id) REFERENCES categories(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_notes_document_id ON notes(document_id);
CREATE INDEX IF NOT EXISTS idx_notes_category_id ON notes(category_id);
CREATE INDEX IF NOT EXISTS idx_categories_parent_id ON categories(parent_id);
`;

export const LIBRARY_TABLES = ["documents", "categories", "notes"] as const;

export const LIBRARY_INDEXES = [
  "idx_notes_document_id",
  "idx_notes_category_id",
  "idx_categories_parent_id",
] as const;
