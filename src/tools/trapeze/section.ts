/**
 * Section and material properties read from the resolved profile record.
 *
 * Catalog rows are imported from manufacturer spreadsheets and are often
 * incomplete, so every numeric property is tagged present / absent / invalid
 * before defaults are applied.
 */
import { isPlainRecord, readNumber } from "./schema.js";
import type { LibraryRecord } from "./types.js";

export type SectionValue =
  | { kind: "present"; value: number }
  | { kind: "absent" }
  | { kind: "invalid"; raw: unknown };

export type SectionField = "E_N_per_mm2" | "Ixx_mm4" | "Zxx_mm3";

export interface SectionFault {
  field: SectionField;
  raw: unknown;
}

export interface MaterialProperties {
  E_N_per_mm2: number;
  Ixx_mm4: number;
  Zxx_mm3: number;
  grade_label: string | null;
  /** Properties that were supplied but unusable; any fault fails the bending check. */
  faults: readonly SectionFault[];
}

export const SECTION_DEFAULTS = {
  E_N_per_mm2: 200_000,
  Ixx_mm4: 1,
  Zxx_mm3: 1,
} as const satisfies Record<SectionField, number>;

const GRADE_FIELDS = ["material_grade", "grade_label", "grade"] as const;

export function readSectionValue(raw: unknown): SectionValue {
  if (raw === undefined || raw === null) return { kind: "absent" };
  if (typeof raw === "string" && raw.trim() === "") return { kind: "absent" };

  const value = readNumber(raw);
  return value !== null && value > 0 ? { kind: "present", value } : { kind: "invalid", raw };
}

export function readGradeLabel(profile: LibraryRecord): string | null {
  for (const key of GRADE_FIELDS) {
    const value = profile[key];
    if (typeof value === "string" && value.trim() !== "") return value.trim();
  }
  return null;
}

export function resolveMaterial(profile: LibraryRecord | null | undefined): MaterialProperties {
  const record: LibraryRecord = isPlainRecord(profile) ? profile : {};
  const faults: SectionFault[] = [];

  // E and Ixx that are present but unusable go through as 0, which the
  // deflection model reports as no deflection; the fault fails bending instead.
  const resolve = (field: SectionField, invalidValue: number): number => {
    const tagged = readSectionValue(record[field]);
    switch (tagged.kind) {
      case "present":
        return tagged.value;
      case "absent":
        return SECTION_DEFAULTS[field];
      case "invalid":
        faults.push({ field, raw: tagged.raw });
        return invalidValue;
    }
  };

  return {
    E_N_per_mm2: resolve("E_N_per_mm2", 0),
    Ixx_mm4: resolve("Ixx_mm4", 0),
    Zxx_mm3: resolve("Zxx_mm3", SECTION_DEFAULTS.Zxx_mm3),
    grade_label: readGradeLabel(record),
    faults,
  };
}
