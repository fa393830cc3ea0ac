/**
 * Shared setup used by the CLI (entry.ts) and the tool definitions.
 */
import fs from "node:fs";
import path from "node:path";
import type { SupportsPerReaction } from "./tools/trapeze/types.js";

// ─── .env loading ────────────────────────────────────────────────────────────

export function loadDotEnv(envPath = path.join(process.cwd(), ".env")) {
  try {
    const content = fs.readFileSync(envPath, "utf-8");
    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;
      const eqIdx = trimmed.indexOf("=");
      if (eqIdx === -1) continue;
      const key = trimmed.slice(0, eqIdx).trim();
      const value = trimmed.slice(eqIdx + 1).trim();
      if (key && !(key in process.env)) {
        process.env[key] = value;
      }
    }
  } catch {
    // No readable .env file; keep the current environment
  }
}

// Load .env immediately so env vars are available for module-level constants
loadDotEnv();

// ─── Configuration ───────────────────────────────────────────────────────────

export function parseSupportsPerReaction(value: unknown, fallback: SupportsPerReaction): SupportsPerReaction {
  if (value === undefined || value === null || value === "") return fallback;
  const n = Number(value);
  return n === 1 || n === 2 ? n : fallback;
}

export const DEFAULT_SUPPORTS_PER_REACTION: SupportsPerReaction = parseSupportsPerReaction(
  process.env.TRAPEZE_SUPPORTS_PER_REACTION,
  1,
);
