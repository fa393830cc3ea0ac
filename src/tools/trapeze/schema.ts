import { z } from "zod";

// Persisted project state is user-edited JSON, so numbers may arrive as strings.
export const NumericSchema = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite());

export const StructuredLoadSchema = z.object({
  N: NumericSchema,
  x_mm: NumericSchema,
  label: z.string().optional().catch(undefined),
});

export type StructuredLoadInput = z.infer<typeof StructuredLoadSchema>;

// ─── Snapshot / library envelopes ────────────────────────────────────────────

const IdSchema = z.string().nullish().catch(null);

export const RecordSchema = z.record(z.string(), z.unknown());

const LibraryRecordSchema = RecordSchema.nullish().catch(null);

export const SnapshotSchema = z.object({
  span_mm: NumericSchema.catch(0),
  tier_count: NumericSchema.catch(1),
  loads: RecordSchema.catch({}),
  profile_id: IdSchema,
  rod_id: IdSchema,
  washer_id: IdSchema,
  anchor_id: IdSchema,
  drop_rod_size: IdSchema,
});

export const LibrarySchema = z
  .object({
    profile: LibraryRecordSchema,
    rod: LibraryRecordSchema,
    washer: LibraryRecordSchema,
    anchor: LibraryRecordSchema,
    rod_caps: LibraryRecordSchema,
  })
  .catch({});

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Finite number from a number or numeric string, otherwise null. */
export function readNumber(value: unknown): number | null {
  const parsed = NumericSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
