/**
 * Trapeze bracket check tool.
 *
 * Runs the bracket check engine on a resolved project snapshot and parts
 * library selection: per-tier reactions, bending moment and deflection
 * envelopes, and PASS/FAIL verdicts for bending, deflection, rod and anchor
 * tension.
 */
import { DEFAULT_SUPPORTS_PER_REACTION, parseSupportsPerReaction } from "../../shared.js";
import { evaluate } from "./check-evaluator.js";
import { LibrarySchema, SnapshotSchema, isPlainRecord } from "./schema.js";
import { CHECK_PRIORITY, type CheckResult } from "./types.js";

// ─── Summary text ────────────────────────────────────────────────────────────

export function formatCheckSummary(result: CheckResult): string[] {
  const tierKeys = Object.keys(result.max_moment_kNm).filter((key) => key !== "total");

  const lines = [
    `Trapeze Check: ${result.status}${result.governing_check !== "none" ? ` (governing: ${result.governing_check})` : ""}`,
    `Weight: ${result.total_weight_kg} kg | Supports per reaction: ${result.supports_per_reaction}`,
    ``,
    `Tiers:`,
  ];

  for (const key of [...tierKeys, "total"]) {
    const r = result.reactions_N[key];
    const reactionText = r ? `R = ${r.left} / ${r.right} N` : "R = -";
    lines.push(
      `  ${key}: ${reactionText}, M = ${result.max_moment_kNm[key]} kN·m, δ = ${result.max_deflection_mm[key]} mm`,
    );
  }

  lines.push(
    ``,
    `Checks:`,
    ...CHECK_PRIORITY.map((category) => `  ${category}: ${result.checks[category]}`),
    `  Stress: ${result.demands.bending_stress_N_per_mm2} / ${result.demands.allowable_stress_N_per_mm2} N/mm²`,
    `  Deflection limit: ${result.deflection_limit_mm} mm [L/200]`,
    `  Rod min size: ${result.rod_min_size}`,
  );

  if (result.notes.length > 0) {
    lines.push(``, `Notes:`, ...result.notes.map((note) => `  - ${note}`));
  }
  return lines;
}

// ─── Tool definition ─────────────────────────────────────────────────────────

export function createTrapezeCheckToolDefinition() {
  return {
    name: "trapeze_check",
    label: "Trapeze Bracket Check",
    description:
      "Check a multi-tier trapeze support bracket (MEP hanger) as simply supported spans. " +
      "Takes the project snapshot (span, tiers, point loads per tier, selected parts) and the " +
      "resolved parts library records. Returns reactions, bending moment and deflection envelopes, " +
      "and PASS/FAIL for bending, deflection, rod tension and anchor tension with the governing check.",
    parameters: {
      type: "object",
      properties: {
        snapshot: {
          type: "object",
          description: "Resolved project snapshot.",
          properties: {
            span_mm: { type: "number", description: "Distance between the two drop rods in mm." },
            tier_count: { type: "number", description: "Number of tiers (1-3).", minimum: 1, maximum: 3 },
            loads: {
              type: "object",
              description:
                "Tier number ('1'..'3') to a load list. Either bare magnitudes in N (spread evenly " +
                "between the supports) or records { N, x_mm, label? }.",
            },
            profile_id: { type: "string" },
            rod_id: { type: "string" },
            washer_id: { type: "string" },
            anchor_id: { type: "string" },
            drop_rod_size: { type: "string", description: "Selected drop rod, e.g. 'M10' (default)." },
          },
          required: ["span_mm", "loads"],
        },
        library: {
          type: "object",
          description:
            "Resolved catalog records: profile (E_N_per_mm2, Ixx_mm4, Zxx_mm3, material_grade), rod, " +
            "washer (bearing_area_multiplier), anchor (tension_capacity_N | capacity_N | tension_N), " +
            "and optional rod_caps (rod size to allowable tension in N).",
        },
        supports_per_reaction: {
          type: "number",
          enum: [1, 2],
          description: "Rods/anchors sharing one support reaction (default from TRAPEZE_SUPPORTS_PER_REACTION, else 1).",
        },
      },
      required: ["snapshot"],
    },
    execute: async (
      _toolCallId: string,
      args: unknown,
    ): Promise<{ content: Array<{ type: string; text: string }>; details?: unknown }> => {
      const params = isPlainRecord(args) ? args : {};

      if (!isPlainRecord(params.snapshot)) {
        throw new Error("snapshot is required and must be an object with span_mm, tier_count and loads.");
      }
      const snapshot = SnapshotSchema.parse(params.snapshot);
      const library = LibrarySchema.parse(params.library ?? {});
      const supportsPerReaction = parseSupportsPerReaction(
        params.supports_per_reaction,
        DEFAULT_SUPPORTS_PER_REACTION,
      );

      const result = evaluate(snapshot, library, { supports_per_reaction: supportsPerReaction });

      return {
        content: [
          { type: "text", text: formatCheckSummary(result).join("\n") },
          { type: "text", text: JSON.stringify(result, null, 2) },
        ],
        details: {
          status: result.status,
          governing_check: result.governing_check,
          total_weight_kg: result.total_weight_kg,
          max_moment_knm: result.max_moment_kNm.total,
          max_deflection_mm: result.max_deflection_mm.total,
          rod_min_size: result.rod_min_size,
        },
      };
    },
  };
}
