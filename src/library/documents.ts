import type Database from "better-sqlite3";

import { createLogger } from "../utils/logger.js";
import { notFound, withIntegrity } from "./errors.js";
import {
  documentPatchSchema,
  newDocumentSchema,
  parseInput,
  type DocumentPatch,
  type DocumentRecord,
  type NewDocument,
} from "./types.js";

const log = createLogger("documents");

export interface DocumentRepo {
  add(input: NewDocument): DocumentRecord;
  get(id: number): DocumentRecord | null;
  require(id: number): DocumentRecord;
  list(): DocumentRecord[];
  /** Change only the supplied fields; `year: null` clears the year. */
  update(id: number, patch: DocumentPatch): DocumentRecord;
  /** Delete a document; returns how many notes went with it. */
  remove(id: number): number;
  count(): number;
}

interface DocumentRow {
  id: number;
  title: string;
  authors: string;
  year: number | null;
  file_path: string;
  created_at: string;
  updated_at: string;
}

interface CountRow {
  count: number;
}

const COLUMNS = "id, title, authors, year, file_path, created_at, updated_at";

const PATCH_FIELDS = ["title", "authors", "year", "filePath"] as const;

const PATCH_COLUMNS: Record<(typeof PATCH_FIELDS)[number], string> = {
  title: "title",
  authors: "authors",
  year: "year",
  filePath: "file_path",
};

export function createDocumentRepo(db: Database.Database): DocumentRepo {
  const insertDocument = db.prepare<[string, string, number | null, string]>(
    "INSERT INTO documents (title, authors, year, file_path) VALUES (?, ?, ?, ?)",
  );
  const selectById = db.prepare<[number], DocumentRow>(
    `SELECT ${COLUMNS} FROM documents WHERE id = ?`,
  );
  const selectAll = db.prepare<[], DocumentRow>(
    `SELECT ${COLUMNS} FROM documents ORDER BY id ASC`,
  );
  const countNotes = db.prepare<[number], CountRow>(
    "SELECT COUNT(*) AS count FROM notes WHERE document_id = ?",
  );
  const deleteById = db.prepare<[number]>("DELETE FROM documents WHERE id = ?");
  const countAll = db.prepare<[], CountRow>("SELECT COUNT(*) AS count FROM documents");

  const repo: DocumentRepo = {
    add(input) {
      const doc = parseInput(newDocumentSchema, input, "document");
      const info = withIntegrity("Cannot add document", () =>
        insertDocument.run(doc.title, doc.authors, doc.year, doc.filePath),
      );
      const id = Number(info.lastInsertRowid);
      log.debug(`Added document #${id}`);
      return repo.require(id);
    },

    get(id) {
      const row = selectById.get(id);
      return row ? mapDocumentRow(row) : null;
    },

    require(id) {
      const doc = repo.get(id);
      if (!doc) throw notFound("Document", id);
      return doc;
    },

    list() {
      return selectAll.all().map(mapDocumentRow);
    },

    update(id, patch) {
      const fields = parseInput(documentPatchSchema, patch, "document update");
      const sets: string[] = [];
      const values: (string | number | null)[] = [];
      for (const key of PATCH_FIELDS) {
        const value = fields[key];
        if (value === undefined) continue;
        sets.push(`${PATCH_COLUMNS[key]} = ?`);
        values.push(value);
      }

      if (sets.length === 0) return repo.require(id);

      const info = withIntegrity("Cannot update document", () =>
        db
          .prepare(
            `UPDATE documents SET ${sets.join(", ")}, updated_at = datetime('now') WHERE id = ?`,
          )
          .run(...values, id),
      );
      if (info.changes === 0) throw notFound("Document", id);
      return repo.require(id);
    },

    remove(id) {
      return db.transaction(() => {
        const notes = countNotes.get(id)?.count ?? 0;
        const info = deleteById.run(id);
        if (info.changes === 0) throw notFound("Document", id);
        log.info(`Removed document #${id} and ${notes} note(s)`);
        return notes;
      })();
    },

    count() {
      return countAll.get()?.count ?? 0;
    },
  };

  return repo;
}

function mapDocumentRow(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    title: row.title,
    authors: row.authors,
    year: row.year,
    filePath: row.file_path,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
