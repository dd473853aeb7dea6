import { LibraryError } from "./errors.js";
import type { LibraryStore } from "./store.js";

export const PLACEHOLDER_DOCUMENT_TITLE = "(Placeholder) No document selected yet";

export interface SeedOptions {
  rootCategory: string;
  childCategories: string[];
  placeholderDocument: boolean;
}

export const DEFAULT_SEED: SeedOptions = {
  rootCategory: "All notes",
  childCategories: ["Reading", "Ideas"],
  placeholderDocument: true,
};

export interface SeedResult {
  categoriesCreated: number;
  placeholderCreated: boolean;
}

/**
 * Create the root category and its children, but only on an empty
 * categories table. Returns the number of categories created.
 */
export function ensureDefaultCategories(
  store: LibraryStore,
  seed: SeedOptions = DEFAULT_SEED,
): number {
  return store.transaction(() => {
    if (store.categories.count() > 0) return 0;
    const root = store.categories.add({ name: seed.rootCategory });
    for (const name of seed.childCategories) {
      store.categories.add({ name, parentId: root.id });
    }
    return 1 + seed.childCategories.length;
  });
}

/**
 * Seed just enough rows for a note to be saved right away: the default
 * categories and, when enabled, a placeholder document with no file.
 */
export function seedMinimalData(
  store: LibraryStore,
  seed: SeedOptions = DEFAULT_SEED,
): SeedResult {
  return store.transaction(() => {
    const categoriesCreated = ensureDefaultCategories(store, seed);
    let placeholderCreated = false;
    if (seed.placeholderDocument && store.documents.count() === 0) {
      store.documents.add({ title: PLACEHOLDER_DOCUMENT_TITLE, filePath: "" });
      placeholderCreated = true;
    }
    return { categoriesCreated, placeholderCreated };
  });
}

/** Lowest document id and lowest category id, used when a note names neither. */
export function getDefaultIds(store: LibraryStore): {
  documentId: number;
  categoryId: number;
} {
  const row = store.db
    .prepare<[], { documentId: number | null; categoryId: number | null }>(
      "SELECT (SELECT MIN(id) FROM documents) AS documentId, (SELECT MIN(id) FROM categories) AS categoryId",
    )
    .get();
  if (!row || row.documentId === null || row.categoryId === null) {
    throw new LibraryError(
      "No default document or category; run `shelfnote init` or add one first",
      "NOT_FOUND",
    );
  }
  return { documentId: row.documentId, categoryId: row.categoryId };
}
