// ─── Loads ───────────────────────────────────────────────────────────────────

export interface PointLoad {
  readonly magnitude_N: number;
  readonly position_mm: number;
  readonly label: string;
}

// ─── Inputs ──────────────────────────────────────────────────────────────────

/** A resolved catalog row (profile, rod, washer or anchor) as the service layer hands it over. */
export type LibraryRecord = Readonly<Record<string, unknown>>;

export interface ProjectSnapshot {
  span_mm: number;
  tier_count: number;
  /** Tier number ("1".."3", or "tier1".."tier3") → raw load list of either supported shape. */
  loads: Readonly<Record<string, unknown>>;
  profile_id?: string | null;
  rod_id?: string | null;
  washer_id?: string | null;
  anchor_id?: string | null;
  drop_rod_size?: string | null;
}

export interface PartsLibrary {
  profile?: LibraryRecord | null;
  rod?: LibraryRecord | null;
  washer?: LibraryRecord | null;
  anchor?: LibraryRecord | null;
  /** Rod size label → allowable tension in N. */
  rod_caps?: LibraryRecord | null;
}

/** How many rods/anchors share one support reaction. */
export type SupportsPerReaction = 1 | 2;

export interface EvaluateOptions {
  supports_per_reaction?: SupportsPerReaction;
}

// ─── Results ─────────────────────────────────────────────────────────────────

export interface Reactions {
  left: number;
  right: number;
}

export interface TierResult {
  reactions: Reactions;
  max_moment_kNm: number;
  max_deflection_mm: number;
  weight_kg: number;
}

export type Verdict = "PASS" | "FAIL";

export type CheckCategory = "bending" | "deflection" | "rod" | "anchor";

export const CHECK_PRIORITY: readonly CheckCategory[] = ["bending", "deflection", "rod", "anchor"];

export interface TensionDemand {
  demand_N: number;
  /** null when the library record carries no capacity field and the check was skipped. */
  capacity_N: number | null;
}

export interface CheckDemands {
  bending_stress_N_per_mm2: number;
  allowable_stress_N_per_mm2: number;
  rod: TensionDemand;
  anchor: TensionDemand;
}

export interface LibraryUsage {
  profile: string | null;
  rod: string | null;
  washer: string | null;
  anchor: string | null;
  grade_label: string | null;
  bearing_area_multiplier: number;
}

export interface CheckResult {
  status: Verdict;
  governing_check: CheckCategory | "none";
  total_weight_kg: number;
  per_tier_weight_kg: Record<string, number>;
  checks: Record<CheckCategory, Verdict>;
  notes: string[];
  reactions_N: Record<string, Reactions>;
  max_moment_kNm: Record<string, number>;
  max_deflection_mm: Record<string, number>;
  deflection_limit_mm: number;
  demands: CheckDemands;
  rod_min_size: string;
  supports_per_reaction: SupportsPerReaction;
  library_used: LibraryUsage;
}
