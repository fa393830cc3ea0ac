import { describe, expect, it } from "vitest";
import { classifyLoads, normalizeTierLoads, tierLoadsFor, totalLoadN } from "./load-model.js";

describe("normalizeTierLoads", () => {
  describe("legacy numeric lists", () => {
    it("spreads bare magnitudes evenly between the supports", () => {
      const loads = normalizeTierLoads([1000, 2000], 1200);
      expect(loads).toEqual([
        { magnitude_N: 1000, position_mm: 400, label: "Load 1" },
        { magnitude_N: 2000, position_mm: 800, label: "Load 2" },
      ]);
    });

    it("keeps slot positions when entries are dropped", () => {
      const loads = normalizeTierLoads([1000, -5, "abc", 0, 2000], 1200);
      expect(loads).toEqual([
        { magnitude_N: 1000, position_mm: 200, label: "Load 1" },
        { magnitude_N: 2000, position_mm: 1000, label: "Load 5" },
      ]);
    });

    it("accepts numeric strings from persisted JSON", () => {
      expect(normalizeTierLoads(["1500"], 1200)).toEqual([
        { magnitude_N: 1500, position_mm: 600, label: "Load 1" },
      ]);
    });
  });

  describe("structured records", () => {
    it("drops non-positive and malformed entries and clamps positions", () => {
      const loads = normalizeTierLoads(
        [
          { N: 500, x_mm: 300, label: "Tray" },
          { N: 0, x_mm: 100 },
          { N: 700, x_mm: -50 },
          { N: 800, x_mm: 5000 },
          { x_mm: 10 },
          "junk",
          42,
        ],
        1200,
      );
      expect(loads).toEqual([
        { magnitude_N: 500, position_mm: 300, label: "Tray" },
        { magnitude_N: 700, position_mm: 0, label: "Load 3" },
        { magnitude_N: 800, position_mm: 1200, label: "Load 4" },
      ]);
    });

    it("falls back to a numbered label when the label is not usable", () => {
      const loads = normalizeTierLoads(
        [
          { N: 100, x_mm: 10, label: 5 },
          { N: 200, x_mm: 20, label: "   " },
        ],
        1000,
      );
      expect(loads.map((load) => load.label)).toEqual(["Load 1", "Load 2"]);
    });

    it("reads numeric strings for magnitude and position", () => {
      expect(normalizeTierLoads([{ N: "250", x_mm: " 40 " }], 100)).toEqual([
        { magnitude_N: 250, position_mm: 40, label: "Load 1" },
      ]);
    });
  });

  it("returns no loads for anything that is not a list", () => {
    expect(normalizeTierLoads(null, 1000)).toEqual([]);
    expect(normalizeTierLoads(undefined, 1000)).toEqual([]);
    expect(normalizeTierLoads({ N: 100, x_mm: 10 }, 1000)).toEqual([]);
    expect(normalizeTierLoads([], 1000)).toEqual([]);
  });

  it("places every load at 0 on a zero or negative span", () => {
    expect(normalizeTierLoads([1000], 0)).toEqual([{ magnitude_N: 1000, position_mm: 0, label: "Load 1" }]);
    expect(normalizeTierLoads([{ N: 10, x_mm: 30 }], -100)).toEqual([
      { magnitude_N: 10, position_mm: 0, label: "Load 1" },
    ]);
  });

  it("returns frozen point loads", () => {
    const [load] = normalizeTierLoads([1000], 1200);
    expect(Object.isFrozen(load)).toBe(true);
  });
});

describe("classifyLoads", () => {
  it("treats a list containing any record as structured", () => {
    expect(classifyLoads([100, { N: 1, x_mm: 0 }])?.kind).toBe("structured");
    expect(classifyLoads([100, "200"])?.kind).toBe("legacy");
    expect(classifyLoads("100")).toBeNull();
  });
});

describe("tierLoadsFor", () => {
  it("looks up the bare tier number first, then the tier-prefixed key", () => {
    expect(tierLoadsFor({ "1": [100], tier1: [200] }, 1)).toEqual([100]);
    expect(tierLoadsFor({ tier2: [300] }, 2)).toEqual([300]);
    expect(tierLoadsFor({}, 3)).toBeUndefined();
  });

  it("falls through to the tier-prefixed key when the bare key is empty", () => {
    expect(tierLoadsFor({ "1": null, tier1: [200] }, 1)).toEqual([200]);
    expect(tierLoadsFor({ "2": undefined, tier2: [300] }, 2)).toEqual([300]);
    expect(tierLoadsFor({ "3": null }, 3)).toBeUndefined();
  });
});

describe("totalLoadN", () => {
  it("sums magnitudes", () => {
    expect(totalLoadN(normalizeTierLoads([1000, 2000], 1200))).toBe(3000);
    expect(totalLoadN([])).toBe(0);
  });
});
