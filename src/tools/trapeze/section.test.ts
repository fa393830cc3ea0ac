import { describe, expect, it } from "vitest";
import { readGradeLabel, readSectionValue, resolveMaterial } from "./section.js";

describe("readSectionValue", () => {
  it("tags missing values as absent", () => {
    expect(readSectionValue(undefined)).toEqual({ kind: "absent" });
    expect(readSectionValue(null)).toEqual({ kind: "absent" });
    expect(readSectionValue("  ")).toEqual({ kind: "absent" });
  });

  it("tags positive numbers as present", () => {
    expect(readSectionValue(5)).toEqual({ kind: "present", value: 5 });
    expect(readSectionValue("12.5")).toEqual({ kind: "present", value: 12.5 });
  });

  it("tags zero, negative and non-numeric values as invalid", () => {
    expect(readSectionValue(0)).toEqual({ kind: "invalid", raw: 0 });
    expect(readSectionValue(-3)).toEqual({ kind: "invalid", raw: -3 });
    expect(readSectionValue("abc")).toEqual({ kind: "invalid", raw: "abc" });
  });
});

describe("resolveMaterial", () => {
  it("applies defaults when the profile is missing", () => {
    expect(resolveMaterial(null)).toEqual({
      E_N_per_mm2: 200_000,
      Ixx_mm4: 1,
      Zxx_mm3: 1,
      grade_label: null,
      faults: [],
    });
  });

  it("reads catalog values", () => {
    const material = resolveMaterial({
      E_N_per_mm2: 210_000,
      Ixx_mm4: "8.1e4",
      Zxx_mm3: 3900,
      material_grade: "  S275 ",
    });
    expect(material).toEqual({
      E_N_per_mm2: 210_000,
      Ixx_mm4: 81_000,
      Zxx_mm3: 3900,
      grade_label: "S275",
      faults: [],
    });
  });

  it("records faults for values that are present but unusable", () => {
    const material = resolveMaterial({ Ixx_mm4: 0, Zxx_mm3: -2 });
    expect(material.E_N_per_mm2).toBe(200_000);
    expect(material.Ixx_mm4).toBe(0);
    expect(material.Zxx_mm3).toBe(1);
    expect(material.faults).toEqual([
      { field: "Ixx_mm4", raw: 0 },
      { field: "Zxx_mm3", raw: -2 },
    ]);
  });
});

describe("readGradeLabel", () => {
  it("tries material_grade, grade_label, then grade", () => {
    expect(readGradeLabel({ grade_label: "S355", grade: "S235" })).toBe("S355");
    expect(readGradeLabel({ material_grade: "", grade: "S235" })).toBe("S235");
    expect(readGradeLabel({ material_grade: 355 })).toBeNull();
  });
});
