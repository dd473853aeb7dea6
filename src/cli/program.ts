import { Command, CommanderError, InvalidArgumentError, Option } from "commander";

import { loadConfig } from "../config/loader.js";
import type { Config } from "../config/schema.js";
import { LibraryError } from "../library/errors.js";
import { getDefaultIds, seedMinimalData } from "../library/seed.js";
import { createLibraryStore, type LibraryStore } from "../library/store.js";
import { formatCategoryTree } from "../library/tree.js";
import type { DocumentPatch, NotePatch } from "../library/types.js";
import { createLogger } from "../utils/logger.js";
import { defaultConfigPath } from "../utils/paths.js";
import {
  formatDocumentDetails,
  formatDocumentLine,
  formatNoteDetails,
  formatNoteLine,
} from "./format.js";
import type { CliIO } from "./io.js";

const log = createLogger("cli");

export interface CliContext {
  io: CliIO;
  env?: Record<string, string | undefined>;
  version?: string;
}

interface GlobalOptions {
  config?: string;
}

interface Library {
  store: LibraryStore;
  config: Config;
}

function parseId(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer id.");
  }
  return n;
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return n;
}

export function buildProgram(ctx: CliContext): Command {
  const { io } = ctx;
  // Config loading writes SHELFNOTE_HOME into the env it is given.
  const env = ctx.env ? { ...ctx.env } : process.env;
  const program = new Command();

  program
    .name("shelfnote")
    .description("Research library: documents, a category tree and notes in SQLite")
    .version(ctx.version ?? "0.0.0")
    .option(
      "-c, --config <path>",
      "Config file path (default: $SHELFNOTE_HOME/app.yaml)",
    )
    .configureOutput({
      writeOut: (str) => io.print(str.trimEnd()),
      writeErr: (str) => io.error(str.trimEnd()),
    })
    .exitOverride();

  const withLibrary = async (fn: (lib: Library) => void): Promise<void> => {
    const explicitPath = program.opts<GlobalOptions>().config ?? env.SHELFNOTE_CONFIG_PATH;
    const config = await loadConfig(explicitPath ?? defaultConfigPath(env), {
      optional: explicitPath === undefined,
      env,
    });
    const store = createLibraryStore({
      sqlitePath: config.database.path,
      journalMode: config.database.journalMode,
    });
    try {
      fn({ store, config });
    } finally {
      store.close();
    }
  };

  program
    .command("init")
    .description("Create the library tables and seed default categories")
    .option("--no-seed", "Only create tables and indexes")
    .action(async (options: { seed: boolean }) => {
      await withLibrary(({ store, config }) => {
        io.success(`Library ready at ${store.path}`);
        if (!options.seed) return;
        const result = seedMinimalData(store, config.seed);
        if (result.categoriesCreated > 0) {
          io.print(`Created ${result.categoriesCreated} default categories`);
        }
        if (result.placeholderCreated) {
          io.print("Created placeholder document");
        }
      });
    });

  // ── documents ──────────────────────────────────────────────────────────────

  const doc = program.command("doc").description("Manage documents");

  doc
    .command("add")
    .description("Record a document and the path of its file")
    .argument("<title>", "Document title")
    .argument("<file>", "Path to the document file")
    .option("--authors <text>", "Authors, free text")
    .option("--year <year>", "Publication year", parseInteger)
    .action(async (title: string, file: string, options: { authors?: string; year?: number }) => {
      await withLibrary(({ store }) => {
        const added = store.documents.add({
          title,
          filePath: file,
          authors: options.authors,
          year: options.year,
        });
        io.success(`Added document #${added.id}: ${added.title}`);
      });
    });

  doc
    .command("list")
    .description("List documents")
    .action(async () => {
      await withLibrary(({ store }) => {
        const docs = store.documents.list();
        if (docs.length === 0) {
          io.print("No documents");
          return;
        }
        for (const d of docs) io.print(formatDocumentLine(d));
      });
    });

  doc
    .command("show")
    .description("Show a document and its notes")
    .argument("<id>", "Document id", parseId)
    .action(async (id: number) => {
      await withLibrary(({ store }) => {
        const found = store.documents.require(id);
        const notes = store.notes.listForDocument(id);
        for (const line of formatDocumentDetails(found, notes.length)) io.print(line);
        for (const note of notes) io.print(`  ${formatNoteLine(note)}`);
      });
    });

  doc
    .command("update")
    .description("Edit document metadata")
    .argument("<id>", "Document id", parseId)
    .option("--title <title>", "New title")
    .option("--authors <text>", "New authors")
    .option("--year <year>", "New publication year", parseInteger)
    .addOption(new Option("--clear-year", "Remove the publication year").conflicts("year"))
    .option("--file <path>", "New file path")
    .action(
      async (
        id: number,
        options: { title?: string; authors?: string; year?: number; clearYear?: boolean; file?: string },
      ) => {
        const patch: DocumentPatch = {
          title: options.title,
          authors: options.authors,
          year: options.clearYear ? null : options.year,
          filePath: options.file,
        };
        if (Object.values(patch).every((v) => v === undefined)) {
          io.warn("Nothing to update");
          return;
        }
        await withLibrary(({ store }) => {
          store.documents.update(id, patch);
          io.success(`Updated document #${id}`);
        });
      },
    );

  doc
    .command("rm")
    .description("Delete a document and all of its notes")
    .argument("<id>", "Document id", parseId)
    .action(async (id: number) => {
      await withLibrary(({ store }) => {
        const notes = store.documents.remove(id);
        io.success(`Removed document #${id} and ${notes} note(s)`);
      });
    });

  // ── categories ─────────────────────────────────────────────────────────────

  const cat = program.command("cat").description("Manage the category tree");

  cat
    .command("add")
    .description("Create a category")
    .argument("<name>", "Category name")
    .option("--parent <id>", "Parent category id", parseId)
    .action(async (name: string, options: { parent?: number }) => {
      await withLibrary(({ store }) => {
        const added = store.categories.add({ name, parentId: options.parent ?? null });
        io.success(`Added category #${added.id}: ${added.name}`);
      });
    });

  cat
    .command("tree")
    .description("Print the category tree")
    .action(async () => {
      await withLibrary(({ store }) => {
        const lines = formatCategoryTree(store.categories.tree());
        if (lines.length === 0) {
          io.print("No categories");
          return;
        }
        for (const line of lines) io.print(line);
      });
    });

  cat
    .command("rename")
    .description("Rename a category")
    .argument("<id>", "Category id", parseId)
    .argument("<name>", "New name")
    .action(async (id: number, name: string) => {
      await withLibrary(({ store }) => {
        const renamed = store.categories.rename(id, name);
        io.success(`Renamed category #${id} to ${renamed.name}`);
      });
    });

  cat
    .command("move")
    .description("Move a category under another one, or to the top level")
    .argument("<id>", "Category id", parseId)
    .option("--parent <id>", "New parent category id", parseId)
    .addOption(new Option("--root", "Make it a top-level category").conflicts("parent"))
    .action(async (id: number, options: { parent?: number; root?: boolean }) => {
      if (options.parent === undefined && !options.root) {
        throw new LibraryError("Pass --parent <id> or --root", "INVALID_INPUT");
      }
      const parentId = options.parent ?? null;
      await withLibrary(({ store }) => {
        store.categories.move(id, parentId);
        io.success(
          parentId === null
            ? `Moved category #${id} to the top level`
            : `Moved category #${id} under #${parentId}`,
        );
      });
    });

  cat
    .command("rm")
    .description("Delete a category, its subcategories and their notes")
    .argument("<id>", "Category id", parseId)
    .action(async (id: number) => {
      await withLibrary(({ store }) => {
        const removed = store.categories.remove(id);
        io.success(
          `Removed category #${id}: ${removed.categories} category(ies), ${removed.notes} note(s)`,
        );
      });
    });

  // ── notes ──────────────────────────────────────────────────────────────────

  const note = program.command("note").description("Manage notes");

  note
    .command("add")
    .description("Save a note (defaults to the first document and category)")
    .option("--doc <id>", "Document id", parseId)
    .option("--cat <id>", "Category id", parseId)
    .option("--excerpt <text>", "Quoted passage")
    .option("--body <markdown>", "Note body in Markdown")
    .option("--page <ref>", 'Page reference, e.g. "12" or "12-14"')
    .action(
      async (options: { doc?: number; cat?: number; excerpt?: string; body?: string; page?: string }) => {
        await withLibrary(({ store }) => {
          const defaults =
            options.doc === undefined || options.cat === undefined ? getDefaultIds(store) : null;
          const added = store.notes.add({
            documentId: options.doc ?? defaults?.documentId ?? 0,
            categoryId: options.cat ?? defaults?.categoryId ?? 0,
            excerpt: options.excerpt,
            bodyMd: options.body,
            pageRef: options.page,
          });
          io.success(`Added note #${added.id}`);
        });
      },
    );

  note
    .command("list")
    .description("List notes in a category subtree or on a document")
    .option("--cat <id>", "Category id (includes subcategories)", parseId)
    .option("--doc <id>", "Document id", parseId)
    .action(async (options: { cat?: number; doc?: number }) => {
      if (options.cat === undefined && options.doc === undefined) {
        throw new LibraryError("Pass --cat <id> or --doc <id>", "INVALID_INPUT");
      }
      await withLibrary(({ store }) => {
        const notes =
          options.cat !== undefined
            ? store.notes.listForCategorySubtree(options.cat)
            : store.notes.listForDocument(options.doc ?? 0);
        if (notes.length === 0) {
          io.print("No notes");
          return;
        }
        for (const n of notes) io.print(formatNoteLine(n));
      });
    });

  note
    .command("recent")
    .description("Show the most recently added notes")
    .option("--limit <n>", "How many notes", parseId)
    .action(async (options: { limit?: number }) => {
      await withLibrary(({ store, config }) => {
        const notes = store.notes.listRecent(options.limit ?? config.notes.recentLimit);
        if (notes.length === 0) {
          io.print("No notes");
          return;
        }
        for (const n of notes) io.print(formatNoteLine(n));
      });
    });

  note
    .command("show")
    .description("Show a note")
    .argument("<id>", "Note id", parseId)
    .action(async (id: number) => {
      await withLibrary(({ store }) => {
        for (const line of formatNoteDetails(store.notes.require(id))) io.print(line);
      });
    });

  note
    .command("edit")
    .description("Change a note")
    .argument("<id>", "Note id", parseId)
    .option("--cat <id>", "Move to category", parseId)
    .option("--excerpt <text>", "New excerpt")
    .option("--body <markdown>", "New body")
    .option("--page <ref>", "New page reference (empty to clear)")
    .action(
      async (id: number, options: { cat?: number; excerpt?: string; body?: string; page?: string }) => {
        const patch: NotePatch = {
          categoryId: options.cat,
          excerpt: options.excerpt,
          bodyMd: options.body,
          pageRef: options.page,
        };
        if (Object.values(patch).every((v) => v === undefined)) {
          io.warn("Nothing to update");
          return;
        }
        await withLibrary(({ store }) => {
          store.notes.update(id, patch);
          io.success(`Updated note #${id}`);
        });
      },
    );

  note
    .command("rm")
    .description("Delete a note")
    .argument("<id>", "Note id", parseId)
    .action(async (id: number) => {
      await withLibrary(({ store }) => {
        store.notes.remove(id);
        io.success(`Removed note #${id}`);
      });
    });

  program
    .command("stats")
    .description("Count rows in each table")
    .action(async () => {
      await withLibrary(({ store }) => {
        const stats = store.stats();
        io.print(`documents: ${stats.documents}`);
        io.print(`categories: ${stats.categories}`);
        io.print(`notes: ${stats.notes}`);
      });
    });

  return program;
}

/**
 * Parse argv and run the matching command. Resolves to the process exit
 * code instead of exiting, so callers (and tests) decide what to do.
 */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const program = buildProgram(ctx);
  try {
    await program.parseAsync(argv, { from: "node" });
    return 0;
  } catch (err) {
    // Commander already printed its own usage errors and help text.
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof LibraryError) {
      ctx.io.error(err.message);
      return 1;
    }
    log.debug("Command failed", err);
    ctx.io.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
