/**
 * Deflection of a simply supported beam by superposition of the closed-form
 * Euler–Bernoulli curve for each point load.
 */
import type { PointLoad } from "./types.js";
import { clamp, spanLength } from "./units.js";

/** Sampling step along the span: L/120, kept within 10–50 mm. */
export function sampleStep(spanMm: number): number {
  return clamp(spanLength(spanMm) / 120, 10, 50);
}

function pointLoadDeflection(L: number, EI: number, load: PointLoad, x: number): number {
  const P = load.magnitude_N;
  const a = clamp(load.position_mm, 0, L);
  const b = L - a;

  if (x <= a) {
    return (P * b * x * (L * L - b * b - x * x)) / (6 * L * EI);
  }
  // Mirror: measure from the right support and swap a/b
  const xr = L - x;
  return (P * a * xr * (L * L - a * a - xr * xr)) / (6 * L * EI);
}

/** Deflection at x in mm (downward positive). */
export function deflectionAt(
  spanMm: number,
  loads: readonly PointLoad[],
  E: number,
  Ixx: number,
  x: number,
): number {
  const L = spanLength(spanMm);
  if (L === 0 || !(E > 0) || !(Ixx > 0)) return 0;

  const EI = E * Ixx;
  const xc = clamp(x, 0, L);
  let delta = 0;
  for (const load of loads) {
    delta += pointLoadDeflection(L, EI, load, xc);
  }
  return delta;
}

/** Stations from 0 to L inclusive at the fixed sampling step. */
export function samplePositions(spanMm: number): number[] {
  const L = spanLength(spanMm);
  if (L === 0) return [0];

  const step = sampleStep(L);
  const count = Math.ceil(L / step - 1e-9);
  const positions: number[] = [];
  for (let i = 0; i <= count; i++) {
    positions.push(Math.min(i * step, L));
  }
  return positions;
}

/**
 * Maximum absolute sampled deflection in mm. Degenerate span or section
 * properties (L, E or Ixx not positive) give 0.
 */
export function maxDeflection(spanMm: number, loads: readonly PointLoad[], E: number, Ixx: number): number {
  const L = spanLength(spanMm);
  if (L === 0 || !(E > 0) || !(Ixx > 0) || loads.length === 0) return 0;

  let max = 0;
  for (const x of samplePositions(L)) {
    max = Math.max(max, Math.abs(deflectionAt(L, loads, E, Ixx, x)));
  }
  return max;
}
