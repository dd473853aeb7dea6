/**
 * Configuration schema (Zod)
 */

import { z } from "zod";

export const journalModeSchema = z.enum(["wal", "delete"]);

export const databaseConfigSchema = z.object({
  /**
   * SQLite file holding the library. Relative paths resolve against the
   * directory of app.yaml; ":memory:" opens a throwaway in-memory store.
   */
  path: z.string().min(1).default("${SHELFNOTE_HOME}/library.db"),
  journalMode: journalModeSchema.default("wal"),
});

export const seedConfigSchema = z.object({
  /** Category created first on an empty library; the other defaults hang off it. */
  rootCategory: z.string().trim().min(1).default("All notes"),
  childCategories: z.array(z.string().trim().min(1)).default(["Reading", "Ideas"]),
  /** Insert a placeholder document so notes can be saved before any import. */
  placeholderDocument: z.boolean().default(true),
});

export const notesConfigSchema = z.object({
  recentLimit: z.number().int().positive().default(10),
});

export const configSchema = z.object({
  database: databaseConfigSchema.default({}),
  seed: seedConfigSchema.default({}),
  notes: notesConfigSchema.default({}),
});

export type JournalMode = z.infer<typeof journalModeSchema>;
export type DatabaseConfig = z.infer<typeof databaseConfigSchema>;
export type SeedConfig = z.infer<typeof seedConfigSchema>;
export type Config = z.infer<typeof configSchema>;
