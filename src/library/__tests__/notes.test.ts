import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { createLibraryStore, type LibraryStore } from "../store.js";
import { expectLibraryError } from "./helpers.js";

describe("note repository", () => {
  let store: LibraryStore;

  beforeEach(() => {
    store = createLibraryStore({ sqlitePath: ":memory:" });
  });

  afterEach(() => {
    store.close();
  });

  it("follows a note from creation to removal with its document", () => {
    const doc = store.documents.add({ title: "Paper A", filePath: "/lib/a.pdf" });
    expect(doc).toMatchObject({ id: 1, authors: "", year: null });
    const root = store.categories.add({ name: "Root" });
    expect(root.id).toBe(1);

    const note = store.notes.add({ documentId: 1, categoryId: 1, excerpt: "key finding" });
    expect(note).toMatchObject({
      id: 1,
      documentId: 1,
      categoryId: 1,
      excerpt: "key finding",
      bodyMd: "",
      pageRef: null,
    });

    store.documents.remove(1);
    expect(store.notes.get(1)).toBeNull();
  });

  describe("with two documents and three categories", () => {
    // Root(1) ── Reading(2);  Other(3)
    beforeEach(() => {
      store.documents.add({ title: "Paper A", filePath: "/lib/a.pdf" });
      store.documents.add({ title: "Paper B", filePath: "/lib/b.pdf" });
      store.categories.add({ name: "Root" });
      store.categories.add({ name: "Reading", parentId: 1 });
      store.categories.add({ name: "Other" });
      store.notes.add({ documentId: 1, categoryId: 1, excerpt: "alpha" });
      store.notes.add({ documentId: 1, categoryId: 2, excerpt: "beta", pageRef: " 12-14 " });
      store.notes.add({ documentId: 2, categoryId: 3, excerpt: "gamma" });
      store.notes.add({ documentId: 2, categoryId: 2, excerpt: "delta", bodyMd: "# Thoughts" });
    });

    it("stores trimmed page references and blank ones as null", () => {
      expect(store.notes.require(2).pageRef).toBe("12-14");
      const blank = store.notes.add({ documentId: 1, categoryId: 1, pageRef: "   " });
      expect(blank.pageRef).toBeNull();
    });

    it("rejects dangling references as integrity errors", () => {
      const missingDoc = expectLibraryError(
        () => store.notes.add({ documentId: 9, categoryId: 1 }),
        "INTEGRITY",
      );
      expect(missingDoc.message).toBe("Cannot add note: FOREIGN KEY constraint failed");

      expectLibraryError(() => store.notes.add({ documentId: 1, categoryId: 9 }), "INTEGRITY");
      expectLibraryError(() => store.notes.add({ documentId: 0, categoryId: 1 }), "INVALID_INPUT");
      expect(store.notes.count()).toBe(4);
    });

    it("lists a category subtree newest first with category names", () => {
      const notes = store.notes.listForCategorySubtree(1);
      expect(notes.map((n) => n.id)).toEqual([4, 2, 1]);
      expect(notes.map((n) => n.categoryName)).toEqual(["Reading", "Reading", "Root"]);

      expect(store.notes.listForCategorySubtree(2).map((n) => n.id)).toEqual([4, 2]);
      expect(store.notes.listForCategorySubtree(3).map((n) => n.excerpt)).toEqual(["gamma"]);
      expect(store.notes.listForCategorySubtree(99)).toEqual([]);
    });

    it("lists notes per document in creation order", () => {
      expect(store.notes.listForDocument(1).map((n) => n.excerpt)).toEqual(["alpha", "beta"]);
      expect(store.notes.listForDocument(2).map((n) => n.excerpt)).toEqual(["gamma", "delta"]);
    });

    it("lists recent notes up to the limit", () => {
      const recent = store.notes.listRecent(2);
      expect(recent.map((n) => n.id)).toEqual([4, 3]);
      expect(recent[0]?.bodyMd).toBe("# Thoughts");
      expect(recent[1]?.categoryName).toBe("Other");
    });

    it("refuses a limit that is not positive", () => {
      const err = expectLibraryError(() => store.notes.listRecent(-1), "INVALID_INPUT");
      expect(err.message).toBe("Invalid recent limit:\n- (root): limit must be a positive integer");
      expectLibraryError(() => store.notes.listRecent(0), "INVALID_INPUT");
    });

    it("updates fields and moves a note between categories", () => {
      const updated = store.notes.update(2, { categoryId: 3, excerpt: "beta!", pageRef: "" });
      expect(updated).toMatchObject({ categoryId: 3, excerpt: "beta!", pageRef: null, bodyMd: "" });
      expect(store.notes.listForCategorySubtree(1).map((n) => n.id)).toEqual([4, 1]);

      const err = expectLibraryError(() => store.notes.update(2, { categoryId: 42 }), "INTEGRITY");
      expect(err.message).toBe("Cannot update note: FOREIGN KEY constraint failed");
      expectLibraryError(() => store.notes.update(42, { excerpt: "x" }), "NOT_FOUND");
    });

    it("removes a single note", () => {
      store.notes.remove(3);
      expect(store.notes.get(3)).toBeNull();
      expect(store.notes.count()).toBe(3);
      expectLibraryError(() => store.notes.remove(3), "NOT_FOUND");
    });

    it("loses every note under a removed category subtree", () => {
      expect(store.categories.remove(1)).toEqual({ categories: 2, notes: 3 });
      expect(store.notes.listRecent(10).map((n) => n.excerpt)).toEqual(["gamma"]);
    });
  });
});
