/**
 * Barrel file: exports all tool definitions and the check engine.
 *
 * Each tool follows the pattern: createXxxToolDefinition() → ToolDefinition
 */

// ─── Structural ─────────────────────────────────────────────────────────────
import { createTrapezeCheckToolDefinition } from "./trapeze/trapeze-check.js";

export { createTrapezeCheckToolDefinition };
export { formatCheckSummary } from "./trapeze/trapeze-check.js";
export { evaluate } from "./trapeze/check-evaluator.js";
export { normalizeTierLoads } from "./trapeze/load-model.js";
export { reactions, maxMoment } from "./trapeze/beam-statics.js";
export { maxDeflection } from "./trapeze/deflection.js";
export { allowableStress, deflectionLimit } from "./trapeze/allowables.js";
export type * from "./trapeze/types.js";

// ─── Convenience: build all tools at once ───────────────────────────────────

export function createAllToolDefinitions() {
  return [
    // Structural
    createTrapezeCheckToolDefinition(),
  ];
}
