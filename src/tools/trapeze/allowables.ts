/**
 * Allowables for the bracket member checks.
 *
 * The 0.6·fy working-stress factor is a fixed placeholder rule, not a
 * code-calibrated resistance factor.
 */
import { spanLength } from "./units.js";

/** Grade substring → yield stress in N/mm², matched in this order. */
const GRADE_YIELD_TABLE: ReadonlyArray<readonly [string, number]> = [
  ["355", 355],
  ["275", 275],
  ["235", 235],
];

export const DEFAULT_YIELD_N_PER_MM2 = 235;
export const ALLOWABLE_STRESS_FACTOR = 0.6;
export const DEFLECTION_SPAN_RATIO = 200;

export function yieldStress(gradeLabel: string | null | undefined): number {
  const label = gradeLabel ?? "";
  for (const [needle, fy] of GRADE_YIELD_TABLE) {
    if (label.includes(needle)) return fy;
  }
  return DEFAULT_YIELD_N_PER_MM2;
}

export function allowableStress(gradeLabel: string | null | undefined): number {
  return ALLOWABLE_STRESS_FACTOR * yieldStress(gradeLabel);
}

/** L/200 in mm; 0 for a zero span, which disables the deflection check. */
export function deflectionLimit(spanMm: number): number {
  return spanLength(spanMm) / DEFLECTION_SPAN_RATIO;
}
