/**
 * Logger utility
 */

import { Logger } from "tslog";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ILogObj } from "tslog";

function formatLine(logObj: ILogObj): string {
  const meta = logObj["_meta"];
  const date =
    typeof meta === "object" && meta !== null && "date" in meta && meta.date instanceof Date
      ? meta.date.toISOString()
      : new Date().toISOString();
  const parts = Object.entries(logObj)
    .filter(([key, v]) => key !== "_meta" && (typeof v === "string" || typeof v === "number"))
    .map(([, v]) => String(v));
  return `${date} ${parts.join(" ")}\n`;
}

/** Optional file transport: if LOG_FILE is set, also append formatted lines. */
function buildAttachedTransports(): ((logObj: ILogObj) => void)[] {
  const logFile = process.env.LOG_FILE;
  if (!logFile) return [];

  mkdirSync(dirname(logFile), { recursive: true });

  return [
    (logObj: ILogObj) => {
      try {
        appendFileSync(logFile, formatLine(logObj));
      } catch (err) {
        // Logging through the logger here would recurse into this transport.
        process.stderr.write(`shelfnote: cannot write ${logFile}: ${String(err)}\n`);
      }
    },
  ];
}

export const logger = new Logger<ILogObj>({
  name: "shelfnote",
  minLevel: process.env.LOG_LEVEL === "debug" ? 2 : 3, // debug=2, info=3
  prettyLogTemplate:
    "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
  attachedTransports: buildAttachedTransports(),
});

export function createLogger(name: string) {
  return logger.getSubLogger({ name });
}
