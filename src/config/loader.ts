/**
 * Config loader with environment variable expansion
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { resolve, dirname, isAbsolute } from "node:path";
import { ZodError } from "zod";
import { configSchema, type Config } from "./schema.js";
import { createLogger } from "../utils/logger.js";
import { ensureShelfnoteHomeEnv, expandHome } from "../utils/paths.js";
import { expandEnvVarsDeep } from "./expand-env.js";

const log = createLogger("config");

export interface LoadConfigOptions {
  /** Fall back to schema defaults instead of failing when the file is absent. */
  optional?: boolean;
  /** Environment for `~`, SHELFNOTE_HOME and `${VAR}` expansion (default: process.env). */
  env?: Record<string, string | undefined>;
}

export async function loadConfig(
  path: string,
  options: LoadConfigOptions = {},
): Promise<Config> {
  const env = options.env ?? process.env;
  // Ensure SHELFNOTE_HOME is always defined so ${SHELFNOTE_HOME} defaults expand.
  ensureShelfnoteHomeEnv(env);

  const expandedPath = expandHome(path, env);
  const configDir = dirname(resolve(expandedPath));

  log.debug(`Loading config from ${expandedPath}`);

  let raw: unknown = {};
  try {
    const content = await readFile(expandedPath, "utf-8");
    raw = parse(content) ?? {};
  } catch (err) {
    if (isNotFound(err)) {
      if (!options.optional) {
        throw new Error(`Config file not found: ${expandedPath}`);
      }
      log.debug(`No config at ${expandedPath}, using defaults`);
    } else {
      throw err;
    }
  }

  // Expand user-provided values first, then again so schema defaults
  // (e.g. ${SHELFNOTE_HOME}/library.db) expand too.
  let config = parseConfig(expandEnvVarsDeep(raw, env));
  config = parseConfig(expandEnvVarsDeep(config, env));

  const dbPath = config.database.path;
  if (dbPath !== ":memory:" && !isAbsolute(dbPath)) {
    config.database.path = resolve(configDir, expandHome(dbPath, env));
  }
  log.debug(`Resolved database path: ${config.database.path}`);

  return config;
}

function parseConfig(value: unknown): Config {
  try {
    return configSchema.parse(value);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new Error(formatZodError(err));
    }
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function formatZodError(error: ZodError): string {
  const lines = error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `- ${path}: ${issue.message}`;
  });
  return `Config validation failed:\n${lines.join("\n")}`;
}
