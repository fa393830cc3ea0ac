/**
 * Simply supported beam statics for point loads: support reactions and the
 * bending moment envelope. Origin at the left support, lengths in mm, forces in N.
 */
import type { PointLoad, Reactions } from "./types.js";
import { clamp, spanLength } from "./units.js";

export function reactions(spanMm: number, loads: readonly PointLoad[]): Reactions {
  const L = spanLength(spanMm);
  if (L === 0) return { left: 0, right: 0 };

  let left = 0;
  let right = 0;
  for (const load of loads) {
    const a = clamp(load.position_mm, 0, L);
    left += (load.magnitude_N * (L - a)) / L;
    right += (load.magnitude_N * a) / L;
  }
  return { left, right };
}

/** M(x) = Ra·x − Σ P·(x − a) over loads at or left of x, in N·mm. */
function momentWithReaction(L: number, leftReaction: number, loads: readonly PointLoad[], x: number): number {
  let M = leftReaction * x;
  for (const load of loads) {
    const a = clamp(load.position_mm, 0, L);
    if (a <= x) {
      M -= load.magnitude_N * (x - a);
    }
  }
  return M;
}

export function momentAt(spanMm: number, loads: readonly PointLoad[], x: number): number {
  const L = spanLength(spanMm);
  if (L === 0) return 0;
  return momentWithReaction(L, reactions(L, loads).left, loads, clamp(x, 0, L));
}

/**
 * Candidate sections for the moment extremum: both supports, every load
 * position, and the midpoint of each consecutive pair.
 */
export function momentCandidates(spanMm: number, loads: readonly PointLoad[]): number[] {
  const L = spanLength(spanMm);
  const stations = [...new Set([0, L, ...loads.map((load) => clamp(load.position_mm, 0, L))])].sort(
    (a, b) => a - b,
  );

  const midpoints: number[] = [];
  let previous: number | undefined;
  for (const x of stations) {
    if (previous !== undefined) midpoints.push((previous + x) / 2);
    previous = x;
  }
  return [...stations, ...midpoints];
}

/** Maximum absolute bending moment in N·mm. */
export function maxMoment(spanMm: number, loads: readonly PointLoad[]): number {
  const L = spanLength(spanMm);
  if (L === 0 || loads.length === 0) return 0;

  const { left } = reactions(L, loads);
  let max = 0;
  for (const x of momentCandidates(L, loads)) {
    max = Math.max(max, Math.abs(momentWithReaction(L, left, loads, x)));
  }
  return max;
}
