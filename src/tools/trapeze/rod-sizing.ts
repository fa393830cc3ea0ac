import { isPlainRecord, readNumber } from "./schema.js";
import type { LibraryRecord } from "./types.js";

// ─── Rod sizes ───────────────────────────────────────────────────────────────

export const ROD_ORDER = ["M6", "M8", "M10", "M12", "M16", "M20"] as const;

export type RodSize = (typeof ROD_ORDER)[number];

export const DEFAULT_ROD_SIZE: RodSize = "M10";
export const LARGEST_ROD_SIZE: RodSize = "M20";

/** "m 10", "M10 A4", "Rod M10" → "M10"; labels without a metric size are upper-cased as-is. */
export function parseRodSize(label: string): string {
  const upper = label.toUpperCase();
  const digits = /M\s*(\d+)/.exec(upper)?.[1];
  return digits !== undefined ? `M${digits}` : upper.trim();
}

/** Position in ROD_ORDER, or -1 for a non-standard size. */
export function rodRank(size: string): number {
  return ROD_ORDER.findIndex((candidate) => candidate === size);
}

export function readRodCapacities(rodCaps: LibraryRecord | null | undefined): Map<RodSize, number> {
  const caps = new Map<RodSize, number>();
  if (!isPlainRecord(rodCaps)) return caps;

  for (const [label, raw] of Object.entries(rodCaps)) {
    const size = ROD_ORDER.find((candidate) => candidate === parseRodSize(label));
    const capacity = readNumber(raw);
    if (size !== undefined && capacity !== null) caps.set(size, capacity);
  }
  return caps;
}

/** Catalogued capacity of a rod label, or null when the table has no entry for it. */
export function rodCapacity(caps: ReadonlyMap<RodSize, number>, size: string): number | null {
  const standard = ROD_ORDER.find((candidate) => candidate === parseRodSize(size));
  return standard !== undefined ? (caps.get(standard) ?? null) : null;
}

/**
 * Smallest standard rod whose capacity covers the per-rod demand. Falls back
 * to the largest size when nothing in the table is sufficient.
 */
export function requiredRodSize(demandN: number, caps: ReadonlyMap<RodSize, number>): RodSize {
  for (const size of ROD_ORDER) {
    const capacity = caps.get(size);
    if (capacity !== undefined && capacity > 0 && capacity >= demandN) return size;
  }
  return LARGEST_ROD_SIZE;
}
