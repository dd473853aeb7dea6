import { formatPageRef } from "../library/page-ref.js";
import type { DocumentRecord, NoteRecord, NoteWithCategory } from "../library/types.js";

const EXCERPT_WIDTH = 60;

function truncate(text: string, width: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > width ? `${flat.slice(0, width - 3)}...` : flat;
}

/** `#3 Paper A (2021) by Ada, Grace` */
export function formatDocumentLine(doc: DocumentRecord): string {
  let line = `#${doc.id} ${doc.title}`;
  if (doc.year !== null) line += ` (${doc.year})`;
  if (doc.authors) line += ` by ${doc.authors}`;
  return line;
}

export function formatDocumentDetails(doc: DocumentRecord, noteCount: number): string[] {
  return [
    formatDocumentLine(doc),
    `file: ${doc.filePath || "(none)"}`,
    `notes: ${noteCount}`,
    `created: ${doc.createdAt}`,
    `updated: ${doc.updatedAt}`,
  ];
}

/** `#7 [Reading] pp. 12-14 key finding` */
export function formatNoteLine(note: NoteWithCategory): string {
  const parts = [`#${note.id}`];
  if (note.categoryName !== null) parts.push(`[${note.categoryName}]`);
  const page = formatPageRef(note.pageRef);
  if (page) parts.push(page);
  const excerpt = truncate(note.excerpt, EXCERPT_WIDTH);
  if (excerpt) parts.push(excerpt);
  return parts.join(" ");
}

export function formatNoteDetails(note: NoteRecord): string[] {
  const lines = [
    `#${note.id}`,
    `document: #${note.documentId}`,
    `category: #${note.categoryId}`,
  ];
  const page = formatPageRef(note.pageRef);
  if (page) lines.push(`page: ${page}`);
  if (note.excerpt) lines.push(`excerpt: ${note.excerpt}`);
  lines.push(`created: ${note.createdAt}`);
  if (note.bodyMd) lines.push("", note.bodyMd);
  return lines;
}
