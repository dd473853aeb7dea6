import { expect } from "vitest";
import { LibraryError, type LibraryErrorCode } from "../errors.js";

/** SQLite datetime('now') text. */
export const SQLITE_TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

export function secondsFromNow(timestamp: string): number {
  return Math.abs(Date.now() - Date.parse(`${timestamp.replace(" ", "T")}Z`)) / 1000;
}

export function expectLibraryError(fn: () => unknown, code: LibraryErrorCode): LibraryError {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(LibraryError);
  if (!(caught instanceof LibraryError)) throw new Error("expected a LibraryError");
  expect(caught.code).toBe(code);
  return caught;
}
