import type Database from "better-sqlite3";

import { createLogger } from "../utils/logger.js";
import { notFound, withIntegrity } from "./errors.js";
import {
  newNoteSchema,
  notePatchSchema,
  parseInput,
  recentLimitSchema,
  type NewNote,
  type NotePatch,
  type NoteRecord,
  type NoteWithCategory,
} from "./types.js";

const log = createLogger("notes");

export interface NoteRepo {
  add(input: NewNote): NoteRecord;
  get(id: number): NoteRecord | null;
  require(id: number): NoteRecord;
  update(id: number, patch: NotePatch): NoteRecord;
  remove(id: number): void;
  /** Notes on one document, oldest first. */
  listForDocument(documentId: number): NoteWithCategory[];
  /** Notes filed under a category or any of its descendants, newest first. */
  listForCategorySubtree(categoryId: number): NoteWithCategory[];
  listRecent(limit: number): NoteWithCategory[];
  count(): number;
}

interface NoteRow {
  id: number;
  document_id: number;
  category_id: number;
  excerpt: string;
  body_md: string;
  page_ref: string | null;
  created_at: string;
  updated_at: string;
}

interface NoteWithCategoryRow extends NoteRow {
  category_name: string | null;
}

interface CountRow {
  count: number;
}

const COLUMNS =
  "id, document_id, category_id, excerpt, body_md, page_ref, created_at, updated_at";
const JOINED_COLUMNS =
  "n.id, n.document_id, n.category_id, n.excerpt, n.body_md, n.page_ref, n.created_at, n.updated_at, c.name AS category_name";

const PATCH_FIELDS = ["categoryId", "excerpt", "bodyMd", "pageRef"] as const;

const PATCH_COLUMNS: Record<(typeof PATCH_FIELDS)[number], string> = {
  categoryId: "category_id",
  excerpt: "excerpt",
  bodyMd: "body_md",
  pageRef: "page_ref",
};

export function createNoteRepo(db: Database.Database): NoteRepo {
  const insertNote = db.prepare<[number, number, string, string, string | null]>(
    "INSERT INTO notes (document_id, category_id, excerpt, body_md, page_ref) VALUES (?, ?, ?, ?, ?)",
  );
  const selectById = db.prepare<[number], NoteRow>(
    `SELECT ${COLUMNS} FROM notes WHERE id = ?`,
  );
  const selectForDocument = db.prepare<[number], NoteWithCategoryRow>(`
    SELECT ${JOINED_COLUMNS}
    FROM notes n
    JOIN categories c ON c.id = n.category_id
    WHERE n.document_id = ?
    ORDER BY n.id ASC
  `);
  const selectForSubtree = db.prepare<[number], NoteWithCategoryRow>(`
    WITH RECURSIVE subtree(id) AS (
      SELECT ?
      UNION
      SELECT c.id FROM categories c JOIN subtree s ON c.parent_id = s.id
    )
    SELECT ${JOINED_COLUMNS}
    FROM notes n
    JOIN categories c ON c.id = n.category_id
    WHERE n.category_id IN (SELECT id FROM subtree)
    ORDER BY n.id DESC
  `);
  const selectRecent = db.prepare<[number], NoteWithCategoryRow>(`
    SELECT ${JOINED_COLUMNS}
    FROM notes n
    LEFT JOIN categories c ON c.id = n.category_id
    ORDER BY n.id DESC
    LIMIT ?
  `);
  const deleteById = db.prepare<[number]>("DELETE FROM notes WHERE id = ?");
  const countAll = db.prepare<[], CountRow>("SELECT COUNT(*) AS count FROM notes");

  const repo: NoteRepo = {
    add(input) {
      const note = parseInput(newNoteSchema, input, "note");
      const info = withIntegrity("Cannot add note", () =>
        insertNote.run(
          note.documentId,
          note.categoryId,
          note.excerpt,
          note.bodyMd,
          note.pageRef,
        ),
      );
      const id = Number(info.lastInsertRowid);
      log.debug(`Added note #${id} (document #${note.documentId}, category #${note.categoryId})`);
      return repo.require(id);
    },

    get(id) {
      const row = selectById.get(id);
      return row ? mapNoteRow(row) : null;
    },

    require(id) {
      const note = repo.get(id);
      if (!note) throw notFound("Note", id);
      return note;
    },

    update(id, patch) {
      const fields = parseInput(notePatchSchema, patch, "note update");
      const sets: string[] = [];
      const values: (string | number | null)[] = [];
      for (const key of PATCH_FIELDS) {
        const value = fields[key];
        if (value === undefined) continue;
        sets.push(`${PATCH_COLUMNS[key]} = ?`);
        values.push(value);
      }

      if (sets.length === 0) return repo.require(id);

      const info = withIntegrity("Cannot update note", () =>
        db
          .prepare(
            `UPDATE notes SET ${sets.join(", ")}, updated_at = datetime('now') WHERE id = ?`,
          )
          .run(...values, id),
      );
      if (info.changes === 0) throw notFound("Note", id);
      return repo.require(id);
    },

    remove(id) {
      const info = deleteById.run(id);
      if (info.changes === 0) throw notFound("Note", id);
      log.debug(`Removed note #${id}`);
    },

    listForDocument(documentId) {
      return selectForDocument.all(documentId).map(mapJoinedRow);
    },

    listForCategorySubtree(categoryId) {
      return selectForSubtree.all(categoryId).map(mapJoinedRow);
    },

    listRecent(limit) {
      const n = parseInput(recentLimitSchema, limit, "recent limit");
      return selectRecent.all(n).map(mapJoinedRow);
    },

    count() {
      return countAll.get()?.count ?? 0;
    },
  };

  return repo;
}

function mapNoteRow(row: NoteRow): NoteRecord {
  return {
    id: row.id,
    documentId: row.document_id,
    categoryId: row.category_id,
    excerpt: row.excerpt,
    bodyMd: row.body_md,
    pageRef: row.page_ref,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mapJoinedRow(row: NoteWithCategoryRow): NoteWithCategory {
  return { ...mapNoteRow(row), categoryName: row.category_name };
}
