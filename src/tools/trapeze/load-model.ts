/**
 * Load model: turns the raw per-tier load lists stored with a project into
 * positioned point loads.
 *
 * Two persisted shapes are accepted:
 *   - legacy: `[1000, 2000]`, bare magnitudes in N, spread evenly between the supports
 *   - structured: `[{ N: 1000, x_mm: 400, label?: "Tray" }, ...]`
 *
 * The shape is resolved once here; everything downstream only sees PointLoad.
 */
import { NumericSchema, StructuredLoadSchema, isPlainRecord } from "./schema.js";
import type { PointLoad } from "./types.js";
import { clamp, spanLength } from "./units.js";

// ─── Raw shapes ──────────────────────────────────────────────────────────────

type RawLoadList =
  | { kind: "legacy"; entries: readonly unknown[] }
  | { kind: "structured"; entries: readonly unknown[] };

export function classifyLoads(raw: unknown): RawLoadList | null {
  if (!Array.isArray(raw)) return null;
  return { kind: raw.some(isPlainRecord) ? "structured" : "legacy", entries: raw };
}

// ─── Normalization ───────────────────────────────────────────────────────────

export function makePointLoad(magnitudeN: number, positionMm: number, spanMm: number, label: string): PointLoad {
  return Object.freeze({
    magnitude_N: magnitudeN,
    position_mm: clamp(positionMm, 0, spanLength(spanMm)),
    label,
  });
}

function legacyLoads(entries: readonly unknown[], span: number): PointLoad[] {
  const n = entries.length;
  const loads: PointLoad[] = [];
  entries.forEach((entry, i) => {
    const magnitude = NumericSchema.safeParse(entry);
    if (!magnitude.success || magnitude.data <= 0) return;
    loads.push(makePointLoad(magnitude.data, (span * (i + 1)) / (n + 1), span, `Load ${i + 1}`));
  });
  return loads;
}

function structuredLoads(entries: readonly unknown[], span: number): PointLoad[] {
  const loads: PointLoad[] = [];
  entries.forEach((entry, i) => {
    const parsed = StructuredLoadSchema.safeParse(entry);
    if (!parsed.success || parsed.data.N <= 0) return;
    const label = parsed.data.label?.trim() || `Load ${i + 1}`;
    loads.push(makePointLoad(parsed.data.N, parsed.data.x_mm, span, label));
  });
  return loads;
}

/**
 * Normalize one tier's raw loads against its span. Never throws: entries that
 * are malformed or carry a non-positive magnitude are skipped, and anything
 * that is not a list yields no loads.
 */
export function normalizeTierLoads(rawLoads: unknown, spanMm: number): readonly PointLoad[] {
  const span = spanLength(spanMm);
  const list = classifyLoads(rawLoads);
  if (!list) return [];

  switch (list.kind) {
    case "legacy":
      return legacyLoads(list.entries, span);
    case "structured":
      return structuredLoads(list.entries, span);
  }
}

/** Raw load list for tier `t`, looked up under "<t>" then "tier<t>". */
export function tierLoadsFor(loads: Readonly<Record<string, unknown>>, tier: number): unknown {
  for (const key of [String(tier), `tier${tier}`]) {
    const value = Object.prototype.hasOwnProperty.call(loads, key) ? loads[key] : undefined;
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

export function totalLoadN(loads: readonly PointLoad[]): number {
  return loads.reduce((sum, load) => sum + load.magnitude_N, 0);
}
