/**
 * Unit constants and small numeric helpers shared by the trapeze check engine.
 * All geometry is in mm, forces in N, stresses in N/mm².
 */

export const GRAVITY_M_PER_S2 = 9.81;
export const NMM_PER_KNM = 1e6;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Span length in mm; negative or non-finite spans resolve to 0. */
export function spanLength(spanMm: number): number {
  return Number.isFinite(spanMm) && spanMm > 0 ? spanMm : 0;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  // Avoid -0 leaking into serialized output
  return rounded === 0 ? 0 : rounded;
}
