import { homedir } from "node:os";
import { join, resolve } from "node:path";

type Env = Record<string, string | undefined>;

/** Expand a leading `~` to the user's home directory. */
export function expandHome(path: string, env: Env = process.env): string {
  const home = env.HOME ?? env.USERPROFILE ?? homedir();
  if (path === "~") return home;
  if (path.startsWith("~/")) return resolve(home, path.slice(2));
  return path;
}

/** Directory holding app.yaml and, by default, the library database. */
export function resolveShelfnoteHome(env: Env = process.env): string {
  const configured = env.SHELFNOTE_HOME?.trim();
  if (configured) return resolve(expandHome(configured, env));
  return join(expandHome("~", env), ".shelfnote");
}

/**
 * Make sure SHELFNOTE_HOME is present in the given environment (process.env
 * unless one is passed) so `${SHELFNOTE_HOME}` references in config values
 * always expand.
 */
export function ensureShelfnoteHomeEnv(env: Env = process.env): string {
  const home = resolveShelfnoteHome(env);
  env.SHELFNOTE_HOME = home;
  return home;
}

export function defaultConfigPath(env: Env = process.env): string {
  return join(resolveShelfnoteHome(env), "app.yaml");
}
