/**
 * Check evaluator for trapeze support brackets.
 *
 * Runs each tier as an independent simply supported span on the shared
 * profile, envelopes the tiers, and checks bending, deflection, rod tension and
 * anchor tension. Pure and synchronous: the same snapshot and library always
 * give the same result, and malformed domain data never throws.
 */
import { allowableStress, deflectionLimit } from "./allowables.js";
import { maxMoment, reactions } from "./beam-statics.js";
import { maxDeflection } from "./deflection.js";
import { normalizeTierLoads, tierLoadsFor, totalLoadN } from "./load-model.js";
import {
  DEFAULT_ROD_SIZE,
  parseRodSize,
  readRodCapacities,
  rodCapacity,
  requiredRodSize,
  rodRank,
} from "./rod-sizing.js";
import { isPlainRecord, readNumber } from "./schema.js";
import { resolveMaterial, type MaterialProperties } from "./section.js";
import {
  CHECK_PRIORITY,
  type CheckCategory,
  type CheckResult,
  type EvaluateOptions,
  type LibraryRecord,
  type PartsLibrary,
  type ProjectSnapshot,
  type Reactions,
  type SupportsPerReaction,
  type TensionDemand,
  type Verdict,
} from "./types.js";
import { GRAVITY_M_PER_S2, NMM_PER_KNM, roundTo, spanLength } from "./units.js";

export const MAX_TIERS = 3;

/** Capacity field names tried in order on rod and anchor records; first numeric value wins. */
export const CAPACITY_FIELDS = ["tension_capacity_N", "capacity_N", "tension_N"] as const;

// ─── Per-tier analysis ───────────────────────────────────────────────────────

interface TierAnalysis {
  reactions: Reactions;
  maxMomentNmm: number;
  maxDeflectionMm: number;
  weightKg: number;
}

export function resolveTierCount(tierCount: number): number {
  if (!Number.isFinite(tierCount)) return 1;
  return Math.min(MAX_TIERS, Math.max(1, Math.trunc(tierCount)));
}

function analyzeTier(span: number, rawLoads: unknown, material: MaterialProperties): TierAnalysis {
  const loads = normalizeTierLoads(rawLoads, span);
  return {
    reactions: reactions(span, loads),
    maxMomentNmm: maxMoment(span, loads),
    maxDeflectionMm: maxDeflection(span, loads, material.E_N_per_mm2, material.Ixx_mm4),
    weightKg: totalLoadN(loads) / GRAVITY_M_PER_S2,
  };
}

function envelope(tiers: readonly TierAnalysis[]): TierAnalysis {
  return tiers.reduce<TierAnalysis>(
    (total, tier) => ({
      reactions: {
        left: total.reactions.left + tier.reactions.left,
        right: total.reactions.right + tier.reactions.right,
      },
      maxMomentNmm: Math.max(total.maxMomentNmm, tier.maxMomentNmm),
      maxDeflectionMm: Math.max(total.maxDeflectionMm, tier.maxDeflectionMm),
      weightKg: total.weightKg + tier.weightKg,
    }),
    { reactions: { left: 0, right: 0 }, maxMomentNmm: 0, maxDeflectionMm: 0, weightKg: 0 },
  );
}

// ─── Library lookups ─────────────────────────────────────────────────────────

export function readCapacity(record: LibraryRecord | null | undefined): number | null {
  if (!isPlainRecord(record)) return null;
  for (const field of CAPACITY_FIELDS) {
    const capacity = readNumber(record[field]);
    if (capacity !== null) return capacity;
  }
  return null;
}

function readBearingMultiplier(washer: LibraryRecord | null | undefined): number {
  if (!isPlainRecord(washer)) return 1;
  const multiplier = readNumber(washer.bearing_area_multiplier);
  return multiplier !== null && multiplier > 0 ? multiplier : 1;
}

// ─── Checks ──────────────────────────────────────────────────────────────────

function tensionDemand(
  governingReaction: number,
  record: LibraryRecord | null | undefined,
  supportsPerReaction: SupportsPerReaction,
): TensionDemand {
  return {
    demand_N: governingReaction / supportsPerReaction,
    capacity_N: readCapacity(record),
  };
}

function tierKey(tier: number): string {
  return `tier${tier}`;
}

function roundReactions({ left, right }: Reactions): Reactions {
  return { left: roundTo(left, 2), right: roundTo(right, 2) };
}

export function evaluate(
  snapshot: ProjectSnapshot,
  library: PartsLibrary,
  options: EvaluateOptions = {},
): CheckResult {
  const span = spanLength(snapshot.span_mm);
  const tierCount = resolveTierCount(snapshot.tier_count);
  const supportsPerReaction = options.supports_per_reaction ?? 1;
  const material = resolveMaterial(library.profile);
  const loadsByTier: Readonly<Record<string, unknown>> = isPlainRecord(snapshot.loads) ? snapshot.loads : {};

  const tiers: TierAnalysis[] = [];
  for (let t = 1; t <= tierCount; t++) {
    tiers.push(analyzeTier(span, tierLoadsFor(loadsByTier, t), material));
  }
  const total = envelope(tiers);

  const checks: Record<CheckCategory, Verdict> = {
    bending: "PASS",
    deflection: "PASS",
    rod: "PASS",
    anchor: "PASS",
  };
  const notes: string[] = [];
  const fail = (category: CheckCategory, note: string) => {
    checks[category] = "FAIL";
    notes.push(note);
  };

  // Bending
  const stress = total.maxMomentNmm / material.Zxx_mm3;
  const allowable = allowableStress(material.grade_label);
  if (stress > allowable) {
    fail(
      "bending",
      `Bending stress ${stress.toFixed(1)} N/mm² exceeds allowable ${allowable.toFixed(1)} N/mm² ` +
        `(M = ${(total.maxMomentNmm / NMM_PER_KNM).toFixed(3)} kNm, Zxx = ${material.Zxx_mm3} mm³).`,
    );
  }
  for (const fault of material.faults) {
    fail(
      "bending",
      `Profile ${fault.field} is invalid (${JSON.stringify(fault.raw)}); bending check failed on section data ` +
        `(stress ${stress.toFixed(1)} N/mm², allowable ${allowable.toFixed(1)} N/mm²).`,
    );
  }

  // Deflection
  const limit = deflectionLimit(span);
  if (limit > 0 && total.maxDeflectionMm > limit) {
    fail(
      "deflection",
      `Deflection ${total.maxDeflectionMm.toFixed(2)} mm exceeds limit ${limit.toFixed(2)} mm (L/200).`,
    );
  }

  // Rod and anchor tension at the governing support
  const governingReaction = Math.max(total.reactions.left, total.reactions.right);
  const rod = tensionDemand(governingReaction, library.rod, supportsPerReaction);
  const anchor = tensionDemand(governingReaction, library.anchor, supportsPerReaction);

  if (rod.capacity_N !== null && rod.demand_N > rod.capacity_N) {
    fail("rod", `Rod tension ${rod.demand_N.toFixed(0)} N exceeds capacity ${rod.capacity_N.toFixed(0)} N.`);
  }

  const selectedRod = parseRodSize(snapshot.drop_rod_size ?? DEFAULT_ROD_SIZE);
  const rodCaps = readRodCapacities(library.rod_caps);
  const rodMinSize = rodCaps.size > 0 ? requiredRodSize(rod.demand_N, rodCaps) : selectedRod;
  const selectedRank = rodRank(selectedRod);
  const minRank = rodRank(rodMinSize);
  if (selectedRank >= 0 && minRank >= 0 && selectedRank < minRank) {
    const selectedCapacity = rodCapacity(rodCaps, selectedRod);
    const capacityText = selectedCapacity !== null ? `capacity ${selectedCapacity.toFixed(0)} N` : "no catalogued capacity";
    fail(
      "rod",
      `Selected rod ${selectedRod} (${capacityText}) is below the minimum ${rodMinSize} ` +
        `for rod tension ${rod.demand_N.toFixed(0)} N.`,
    );
  }

  if (anchor.capacity_N !== null && anchor.demand_N > anchor.capacity_N) {
    fail(
      "anchor",
      `Anchor tension ${anchor.demand_N.toFixed(0)} N exceeds capacity ${anchor.capacity_N.toFixed(0)} N.`,
    );
  }

  const governing = CHECK_PRIORITY.find((category) => checks[category] === "FAIL") ?? "none";

  // ─── Assemble output ───
  const perTierWeight: Record<string, number> = {};
  const reactionsN: Record<string, Reactions> = {};
  const momentKNm: Record<string, number> = {};
  const deflectionMm: Record<string, number> = {};
  tiers.forEach((tier, i) => {
    const key = tierKey(i + 1);
    perTierWeight[String(i + 1)] = roundTo(tier.weightKg, 2);
    reactionsN[key] = roundReactions(tier.reactions);
    momentKNm[key] = roundTo(tier.maxMomentNmm / NMM_PER_KNM, 3);
    deflectionMm[key] = roundTo(tier.maxDeflectionMm, 3);
  });
  reactionsN.total = roundReactions(total.reactions);
  momentKNm.total = roundTo(total.maxMomentNmm / NMM_PER_KNM, 3);
  deflectionMm.total = roundTo(total.maxDeflectionMm, 3);

  return {
    status: governing === "none" ? "PASS" : "FAIL",
    governing_check: governing,
    total_weight_kg: roundTo(total.weightKg, 2),
    per_tier_weight_kg: perTierWeight,
    checks,
    notes,
    reactions_N: reactionsN,
    max_moment_kNm: momentKNm,
    max_deflection_mm: deflectionMm,
    deflection_limit_mm: roundTo(limit, 3),
    demands: {
      bending_stress_N_per_mm2: roundTo(stress, 2),
      allowable_stress_N_per_mm2: roundTo(allowable, 2),
      rod: { demand_N: roundTo(rod.demand_N, 2), capacity_N: rod.capacity_N },
      anchor: { demand_N: roundTo(anchor.demand_N, 2), capacity_N: anchor.capacity_N },
    },
    rod_min_size: rodMinSize,
    supports_per_reaction: supportsPerReaction,
    library_used: {
      profile: snapshot.profile_id ?? null,
      rod: snapshot.rod_id ?? null,
      washer: snapshot.washer_id ?? null,
      anchor: snapshot.anchor_id ?? null,
      grade_label: material.grade_label,
      bearing_area_multiplier: readBearingMultiplier(library.washer),
    },
  };
}
