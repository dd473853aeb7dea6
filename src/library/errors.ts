import Database from "better-sqlite3";
import type { ZodError } from "zod";

export type LibraryErrorCode =
  | "NOT_FOUND"
  | "INTEGRITY"
  | "INVALID_INPUT"
  | "CYCLE";

/** Error raised by the library store and its repositories. */
export class LibraryError extends Error {
  constructor(
    message: string,
    public code: LibraryErrorCode,
    public details?: unknown,
  ) {
    super(message);
    this.name = "LibraryError";
  }
}

export function notFound(entity: string, id: number): LibraryError {
  return new LibraryError(`${entity} #${id} not found`, "NOT_FOUND", { entity, id });
}

export function invalidInput(what: string, error: ZodError): LibraryError {
  const lines = error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `- ${path}: ${issue.message}`;
  });
  return new LibraryError(
    `Invalid ${what}:\n${lines.join("\n")}`,
    "INVALID_INPUT",
    error.issues,
  );
}

/**
 * SQLite reports constraint failures (NOT NULL, FOREIGN KEY, ...) and
 * datatype mismatches with these result codes.
 */
function isIntegrityCode(code: string): boolean {
  return code.startsWith("SQLITE_CONSTRAINT") || code === "SQLITE_MISMATCH";
}

/**
 * Run a write and surface constraint violations as INTEGRITY errors.
 * Any other failure is rethrown untouched.
 */
export function withIntegrity<T>(context: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof Database.SqliteError && isIntegrityCode(err.code)) {
      throw new LibraryError(`${context}: ${err.message}`, "INTEGRITY", {
        sqliteCode: err.code,
      });
    }
    throw err;
  }
}
