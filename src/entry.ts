#!/usr/bin/env node
/**
 * trapeze-check: run the bracket check engine from the terminal.
 *
 *   trapeze-check <input.json> [--json] [--supports 1|2]
 *
 * The input file holds `{ "snapshot": {...}, "library": {...} }`, the same
 * shape the trapeze_check tool takes.
 */
import { DEFAULT_SUPPORTS_PER_REACTION, parseSupportsPerReaction } from "./shared.js";

import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { evaluate } from "./tools/trapeze/check-evaluator.js";
import { LibrarySchema, SnapshotSchema, isPlainRecord } from "./tools/trapeze/schema.js";
import { formatCheckSummary } from "./tools/trapeze/trapeze-check.js";

// ─── Output ──────────────────────────────────────────────────────────────────

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const USAGE = "Usage: trapeze-check <input.json> [--json] [--supports 1|2]";

function readInput(filePath: string): { snapshot: unknown; library: unknown } {
  const raw = fs.readFileSync(path.resolve(filePath), "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isPlainRecord(parsed) || !isPlainRecord(parsed.snapshot)) {
    throw new Error(`${filePath}: expected an object with a "snapshot" object.`);
  }
  return { snapshot: parsed.snapshot, library: parsed.library ?? {} };
}

// ─── Main ────────────────────────────────────────────────────────────────────

/** Runs the CLI and returns the process exit code. */
export function runCli(argv: string[], output: CliOutput = consoleOutput): number {
  let values: { json?: boolean; supports?: string };
  let positionals: string[];
  try {
    ({ values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        json: { type: "boolean" },
        supports: { type: "string" },
      },
    }));
  } catch (err) {
    output.err(`\x1b[31m${err instanceof Error ? err.message : String(err)}\x1b[0m`);
    output.err(USAGE);
    return 2;
  }

  const inputPath = positionals[0];
  if (!inputPath || positionals.length > 1) {
    output.err(USAGE);
    return 2;
  }

  const supportsPerReaction = parseSupportsPerReaction(values.supports, DEFAULT_SUPPORTS_PER_REACTION);
  if (values.supports !== undefined && String(supportsPerReaction) !== values.supports.trim()) {
    output.err(`\x1b[31m--supports must be 1 or 2, got '${values.supports}'.\x1b[0m`);
    return 2;
  }

  let input: { snapshot: unknown; library: unknown };
  try {
    input = readInput(inputPath);
  } catch (err) {
    output.err(`\x1b[31mError: ${err instanceof Error ? err.message : String(err)}\x1b[0m`);
    return 1;
  }

  const result = evaluate(SnapshotSchema.parse(input.snapshot), LibrarySchema.parse(input.library), {
    supports_per_reaction: supportsPerReaction,
  });

  if (values.json) {
    output.out(JSON.stringify(result, null, 2));
  } else {
    output.out(`\x1b[2m┌ trapeze-check\x1b[0m`);
    output.out(`\x1b[2m│ input: ${inputPath}\x1b[0m`);
    output.out(`\x1b[2m└ supports per reaction: ${supportsPerReaction}\x1b[0m`);
    output.out("");
    for (const line of formatCheckSummary(result)) output.out(line);
  }
  return result.status === "PASS" ? 0 : 3;
}

/**
 * Whether `invokedPath` (process.argv[1]) launches the module at `moduleUrl`.
 * Node loads the main module from its real path, so symlinks such as npm's
 * bin links are resolved before comparing.
 */
export function isMainModule(moduleUrl: string, invokedPath: string | undefined): boolean {
  if (!invokedPath) return false;
  const resolved = path.resolve(invokedPath);
  const realPath = fs.existsSync(resolved) ? fs.realpathSync(resolved) : resolved;
  return moduleUrl === pathToFileURL(realPath).href;
}

if (isMainModule(import.meta.url, process.argv[1])) {
  process.exitCode = runCli(process.argv.slice(2));
}
