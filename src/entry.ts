#!/usr/bin/env node
/**
 * shelfnote entry point
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { runCli } from "./cli/program.js";
import { createDefaultCliIO } from "./cli/io.js";
import { logger } from "./utils/logger.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = z
  .object({ name: z.string(), version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")));

const nodeMajor = Number.parseInt(process.versions.node.split(".")[0] ?? "0", 10);
if (Number.isNaN(nodeMajor) || nodeMajor < 20) {
  logger.error(
    `Node.js ${process.versions.node} is not supported. Please upgrade to >= 20.0.0.`,
  );
  process.exit(1);
}

process.exitCode = await runCli(process.argv, {
  io: createDefaultCliIO(),
  env: process.env,
  version: pkg.version,
});
