import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { createLibraryStore, type LibraryStore } from "../store.js";
import { SQLITE_TIMESTAMP, expectLibraryError, secondsFromNow } from "./helpers.js";

describe("document repository", () => {
  let store: LibraryStore;

  beforeEach(() => {
    store = createLibraryStore({ sqlitePath: ":memory:" });
  });

  afterEach(() => {
    store.close();
  });

  it("adds a document with only title and file path", () => {
    const doc = store.documents.add({ title: "Paper A", filePath: "/lib/a.pdf" });

    expect(doc).toMatchObject({
      id: 1,
      title: "Paper A",
      authors: "",
      year: null,
      filePath: "/lib/a.pdf",
    });
    expect(doc.createdAt).toMatch(SQLITE_TIMESTAMP);
    expect(doc.updatedAt).toBe(doc.createdAt);
    expect(secondsFromNow(doc.createdAt)).toBeLessThan(60);
  });

  it("stores authors and year and trims the title", () => {
    const doc = store.documents.add({
      title: "  Paper B ",
      filePath: "/lib/b.pdf",
      authors: "Ada Lovelace",
      year: 1843,
    });
    expect(doc.title).toBe("Paper B");
    expect(doc.authors).toBe("Ada Lovelace");
    expect(doc.year).toBe(1843);
  });

  it("rejects a blank title and a fractional year", () => {
    const blank = expectLibraryError(
      () => store.documents.add({ title: "   ", filePath: "/lib/a.pdf" }),
      "INVALID_INPUT",
    );
    expect(blank.message).toBe("Invalid document:\n- title: title is required");

    expectLibraryError(
      () => store.documents.add({ title: "Paper", filePath: "/lib/a.pdf", year: 2020.5 }),
      "INVALID_INPUT",
    );
    expect(store.documents.count()).toBe(0);
  });

  it("lists documents in id order", () => {
    store.documents.add({ title: "First", filePath: "/lib/1.pdf" });
    store.documents.add({ title: "Second", filePath: "/lib/2.pdf" });

    expect(store.documents.list().map((d) => d.title)).toEqual(["First", "Second"]);
  });

  it("returns null or NOT_FOUND for a missing id", () => {
    expect(store.documents.get(42)).toBeNull();
    const err = expectLibraryError(() => store.documents.require(42), "NOT_FOUND");
    expect(err.message).toBe("Document #42 not found");
  });

  it("updates only the supplied fields and restamps updated_at", () => {
    const doc = store.documents.add({
      title: "Draft",
      filePath: "/lib/a.pdf",
      authors: "Ada",
      year: 2020,
    });
    store.db
      .prepare("UPDATE documents SET updated_at = '2000-01-01 00:00:00' WHERE id = ?")
      .run(doc.id);

    const updated = store.documents.update(doc.id, { title: "Final", year: null });

    expect(updated).toMatchObject({
      id: doc.id,
      title: "Final",
      authors: "Ada",
      year: null,
      filePath: "/lib/a.pdf",
      createdAt: doc.createdAt,
    });
    expect(updated.updatedAt).not.toBe("2000-01-01 00:00:00");
    expect(updated.updatedAt).toMatch(SQLITE_TIMESTAMP);
  });

  it("leaves the row alone for an empty patch", () => {
    const doc = store.documents.add({ title: "Same", filePath: "/lib/a.pdf" });
    expect(store.documents.update(doc.id, {})).toEqual(doc);
  });

  it("fails to update a missing document", () => {
    expectLibraryError(() => store.documents.update(7, { title: "Nope" }), "NOT_FOUND");
  });

  it("removes a document together with its notes", () => {
    const doc = store.documents.add({ title: "Paper A", filePath: "/lib/a.pdf" });
    const other = store.documents.add({ title: "Paper B", filePath: "/lib/b.pdf" });
    const category = store.categories.add({ name: "Root" });
    store.notes.add({ documentId: doc.id, categoryId: category.id, excerpt: "one" });
    store.notes.add({ documentId: doc.id, categoryId: category.id, excerpt: "two" });
    const kept = store.notes.add({ documentId: other.id, categoryId: category.id });

    expect(store.documents.remove(doc.id)).toBe(2);

    expect(store.documents.get(doc.id)).toBeNull();
    expect(store.notes.listRecent(10).map((n) => n.id)).toEqual([kept.id]);
  });

  it("fails to remove a missing document", () => {
    expectLibraryError(() => store.documents.remove(3), "NOT_FOUND");
  });
});
