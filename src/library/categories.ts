import type Database from "better-sqlite3";

import { createLogger } from "../utils/logger.js";
import { LibraryError, notFound, withIntegrity } from "./errors.js";
import { buildCategoryTree } from "./tree.js";
import {
  categoryNameSchema,
  newCategorySchema,
  parseInput,
  type CategoryNode,
  type CategoryRecord,
  type NewCategory,
} from "./types.js";

const log = createLogger("categories");

export interface CategoryRemoval {
  /** The category itself plus every descendant. */
  categories: number;
  notes: number;
}

export interface CategoryRepo {
  add(input: NewCategory): CategoryRecord;
  get(id: number): CategoryRecord | null;
  require(id: number): CategoryRecord;
  /** All categories, ordered by parent id then name. */
  list(): CategoryRecord[];
  rename(id: number, name: string): CategoryRecord;
  /**
   * Re-parent a category (`null` makes it a root). Rejects a parent inside
   * the category's own subtree, since the schema itself allows cycles.
   */
  move(id: number, parentId: number | null): CategoryRecord;
  children(id: number): CategoryRecord[];
  /** Parent chain, nearest first. */
  ancestors(id: number): CategoryRecord[];
  /** The category id followed by all descendant ids; empty if it does not exist. */
  subtreeIds(id: number): number[];
  tree(): CategoryNode[];
  remove(id: number): CategoryRemoval;
  count(): number;
}

interface CategoryRow {
  id: number;
  name: string;
  parent_id: number | null;
  created_at: string;
  updated_at: string;
}

interface AncestorRow extends CategoryRow {
  depth: number;
}

interface IdRow {
  id: number;
}

interface CountRow {
  count: number;
}

const COLUMNS = "id, name, parent_id, created_at, updated_at";

// UNION (not UNION ALL) drops rows already visited, so a cyclic parent
// chain still terminates.
const SUBTREE_CTE = `
  WITH RECURSIVE subtree(id) AS (
    SELECT id FROM categories WHERE id = ?
    UNION
    SELECT c.id FROM categories c JOIN subtree s ON c.parent_id = s.id
  )`;

export function createCategoryRepo(db: Database.Database): CategoryRepo {
  const insertCategory = db.prepare<[string, number | null]>(
    "INSERT INTO categories (name, parent_id) VALUES (?, ?)",
  );
  const selectById = db.prepare<[number], CategoryRow>(
    `SELECT ${COLUMNS} FROM categories WHERE id = ?`,
  );
  const selectAll = db.prepare<[], CategoryRow>(
    `SELECT ${COLUMNS} FROM categories ORDER BY parent_id ASC, name ASC`,
  );
  const selectChildren = db.prepare<[number], CategoryRow>(
    `SELECT ${COLUMNS} FROM categories WHERE parent_id = ? ORDER BY name ASC, id ASC`,
  );
  const selectSubtree = db.prepare<[number], IdRow>(`${SUBTREE_CTE} SELECT id FROM subtree`);
  const countSubtreeNotes = db.prepare<[number], CountRow>(
    `${SUBTREE_CTE} SELECT COUNT(*) AS count FROM notes WHERE category_id IN (SELECT id FROM subtree)`,
  );
  // Depth is bounded by the row count so a cycle cannot recurse forever.
  const selectAncestors = db.prepare<[number], AncestorRow>(`
    WITH RECURSIVE chain(id, parent_id, depth) AS (
      SELECT id, parent_id, 0 FROM categories WHERE id = ?
      UNION ALL
      SELECT c.id, c.parent_id, chain.depth + 1
      FROM categories c JOIN chain ON c.id = chain.parent_id
      WHERE chain.depth < (SELECT COUNT(*) FROM categories)
    )
    SELECT c.id, c.name, c.parent_id, c.created_at, c.updated_at, chain.depth
    FROM chain JOIN categories c ON c.id = chain.id
    WHERE chain.depth > 0
    ORDER BY chain.depth ASC
  `);
  const renameById = db.prepare<[string, number]>(
    "UPDATE categories SET name = ?, updated_at = datetime('now') WHERE id = ?",
  );
  const moveById = db.prepare<[number | null, number]>(
    "UPDATE categories SET parent_id = ?, updated_at = datetime('now') WHERE id = ?",
  );
  const deleteById = db.prepare<[number]>("DELETE FROM categories WHERE id = ?");
  const countAll = db.prepare<[], CountRow>("SELECT COUNT(*) AS count FROM categories");

  const repo: CategoryRepo = {
    add(input) {
      const category = parseInput(newCategorySchema, input, "category");
      const info = withIntegrity("Cannot add category", () =>
        insertCategory.run(category.name, category.parentId),
      );
      const id = Number(info.lastInsertRowid);
      log.debug(`Added category #${id} (${category.name})`);
      return repo.require(id);
    },

    get(id) {
      const row = selectById.get(id);
      return row ? mapCategoryRow(row) : null;
    },

    require(id) {
      const category = repo.get(id);
      if (!category) throw notFound("Category", id);
      return category;
    },

    list() {
      return selectAll.all().map(mapCategoryRow);
    },

    rename(id, name) {
      const next = parseInput(categoryNameSchema, name, "category name");
      const info = renameById.run(next, id);
      if (info.changes === 0) throw notFound("Category", id);
      return repo.require(id);
    },

    move(id, parentId) {
      return db.transaction(() => {
        repo.require(id);
        if (parentId !== null && repo.subtreeIds(id).includes(parentId)) {
          throw new LibraryError(
            `Cannot move category #${id} under #${parentId}: it would become its own ancestor`,
            "CYCLE",
            { id, parentId },
          );
        }
        withIntegrity("Cannot move category", () => moveById.run(parentId, id));
        return repo.require(id);
      })();
    },

    children(id) {
      return selectChildren.all(id).map(mapCategoryRow);
    },

    ancestors(id) {
      const seen = new Set<number>([id]);
      const out: CategoryRecord[] = [];
      for (const row of selectAncestors.all(id)) {
        if (seen.has(row.id)) break;
        seen.add(row.id);
        out.push(mapCategoryRow(row));
      }
      return out;
    },

    subtreeIds(id) {
      return selectSubtree.all(id).map((row) => row.id);
    },

    tree() {
      return buildCategoryTree(repo.list());
    },

    remove(id) {
      return db.transaction(() => {
        const categories = repo.subtreeIds(id).length;
        if (categories === 0) throw notFound("Category", id);
        const notes = countSubtreeNotes.get(id)?.count ?? 0;
        deleteById.run(id);
        log.info(`Removed category #${id}: ${categories} category(ies), ${notes} note(s)`);
        return { categories, notes };
      })();
    },

    count() {
      return countAll.get()?.count ?? 0;
    },
  };

  return repo;
}

function mapCategoryRow(row: CategoryRow): CategoryRecord {
  return {
    id: row.id,
    name: row.name,
    parentId: row.parent_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
