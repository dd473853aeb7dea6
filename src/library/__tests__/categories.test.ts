import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { createLibraryStore, type LibraryStore } from "../store.js";
import { expectLibraryError } from "./helpers.js";

describe("category repository", () => {
  let store: LibraryStore;

  beforeEach(() => {
    store = createLibraryStore({ sqlitePath: ":memory:" });
  });

  afterEach(() => {
    store.close();
  });

  // Root(1) ── Zeta(2) ── Deep(4)
  //         └─ Alpha(3)
  function seedTree(): void {
    const root = store.categories.add({ name: "Root" });
    const zeta = store.categories.add({ name: "Zeta", parentId: root.id });
    store.categories.add({ name: "Alpha", parentId: root.id });
    store.categories.add({ name: "Deep", parentId: zeta.id });
  }

  it("adds root and child categories", () => {
    const root = store.categories.add({ name: "Root" });
    const child = store.categories.add({ name: "Child", parentId: root.id });

    expect(root).toMatchObject({ id: 1, name: "Root", parentId: null });
    expect(child).toMatchObject({ id: 2, name: "Child", parentId: 1 });
  });

  it("reports a missing parent as an integrity error", () => {
    const err = expectLibraryError(
      () => store.categories.add({ name: "Orphan", parentId: 5 }),
      "INTEGRITY",
    );
    expect(err.message).toBe("Cannot add category: FOREIGN KEY constraint failed");
    expect(err.details).toEqual({ sqliteCode: "SQLITE_CONSTRAINT_FOREIGNKEY" });
  });

  it("lists by parent then name", () => {
    seedTree();
    expect(store.categories.list().map((c) => c.id)).toEqual([1, 3, 2, 4]);
  });

  it("walks children, ancestors and subtrees", () => {
    seedTree();

    expect(store.categories.children(1).map((c) => c.name)).toEqual(["Alpha", "Zeta"]);
    expect(store.categories.ancestors(4).map((c) => c.name)).toEqual(["Zeta", "Root"]);
    expect(store.categories.ancestors(1)).toEqual([]);
    expect([...store.categories.subtreeIds(1)].sort((a, b) => a - b)).toEqual([1, 2, 3, 4]);
    expect([...store.categories.subtreeIds(2)].sort((a, b) => a - b)).toEqual([2, 4]);
    expect(store.categories.subtreeIds(99)).toEqual([]);
  });

  it("builds the tree with children sorted by name", () => {
    seedTree();

    const [root, ...rest] = store.categories.tree();
    expect(rest).toEqual([]);
    expect(root?.category.name).toBe("Root");
    expect(root?.children.map((n) => n.category.name)).toEqual(["Alpha", "Zeta"]);
    expect(root?.children[1]?.children.map((n) => n.category.name)).toEqual(["Deep"]);
  });

  it("renames a category", () => {
    seedTree();
    expect(store.categories.rename(2, "  Omega ").name).toBe("Omega");
    expectLibraryError(() => store.categories.rename(2, ""), "INVALID_INPUT");
    expectLibraryError(() => store.categories.rename(99, "Nope"), "NOT_FOUND");
  });

  it("moves a category and refuses to create a cycle", () => {
    seedTree();

    expect(store.categories.move(4, 3).parentId).toBe(3);
    expect(store.categories.ancestors(4).map((c) => c.id)).toEqual([3, 1]);

    const cycle = expectLibraryError(() => store.categories.move(1, 4), "CYCLE");
    expect(cycle.message).toBe(
      "Cannot move category #1 under #4: it would become its own ancestor",
    );
    expectLibraryError(() => store.categories.move(2, 2), "CYCLE");
    expect(store.categories.require(1).parentId).toBeNull();

    expect(store.categories.move(2, null).parentId).toBeNull();
    expectLibraryError(() => store.categories.move(3, 99), "INTEGRITY");
    expectLibraryError(() => store.categories.move(99, null), "NOT_FOUND");
  });

  it("removes a subtree with its notes and reports the counts", () => {
    seedTree();
    const doc = store.documents.add({ title: "Paper A", filePath: "/lib/a.pdf" });
    for (const categoryId of [1, 2, 3, 4]) {
      store.notes.add({ documentId: doc.id, categoryId });
    }

    expect(store.categories.remove(2)).toEqual({ categories: 2, notes: 2 });
    expect(store.categories.list().map((c) => c.id)).toEqual([1, 3]);
    expect(store.notes.count()).toBe(2);

    expectLibraryError(() => store.categories.remove(2), "NOT_FOUND");
  });

  it("copes with a self-parented row the schema lets through", () => {
    store.db.prepare("INSERT INTO categories (name, parent_id) VALUES (?, ?)").run("Loop", 1);

    expect(store.categories.require(1).parentId).toBe(1);
    expect(store.categories.subtreeIds(1)).toEqual([1]);
    expect(store.categories.ancestors(1)).toEqual([]);
    expect(store.categories.tree().map((n) => n.category.name)).toEqual(["Loop"]);
  });

  it("keeps a two-node cycle visible in the tree", () => {
    store.categories.add({ name: "A" });
    store.categories.add({ name: "B", parentId: 1 });
    store.db.prepare("UPDATE categories SET parent_id = 2 WHERE id = 1").run();

    const forest = store.categories.tree();
    expect(forest.map((n) => n.category.name)).toEqual(["A"]);
    expect(forest[0]?.children.map((n) => n.category.name)).toEqual(["B"]);
    expect(store.categories.ancestors(1).map((c) => c.name)).toEqual(["B"]);
  });
});
