import { describe, expect, it } from "vitest";
import { makePointLoad } from "./load-model.js";
import { deflectionAt, maxDeflection, samplePositions, sampleStep } from "./deflection.js";

const E = 200_000;
const load = (N: number, x: number, span: number) => makePointLoad(N, x, span, "P");

describe("maxDeflection", () => {
  it("matches PL³/48EI for a central point load", () => {
    const P = 5000;
    const L = 2000;
    const I = 4_000_000;
    expect(maxDeflection(L, [load(P, L / 2, L)], E, I)).toBeCloseTo((P * L ** 3) / (48 * E * I), 6);
  });

  it("superposes several loads", () => {
    const L = 1200;
    const I = 2_000_000;
    const a = load(1000, 400, L);
    const b = load(1500, 800, L);
    expect(deflectionAt(L, [a, b], E, I, 600)).toBeCloseTo(
      deflectionAt(L, [a], E, I, 600) + deflectionAt(L, [b], E, I, 600),
      12,
    );
  });

  it("never decreases when a load grows", () => {
    const L = 1500;
    const I = 1_000_000;
    const before = maxDeflection(L, [load(1000, 300, L), load(800, 1100, L)], E, I);
    const after = maxDeflection(L, [load(1000, 300, L), load(900, 1100, L)], E, I);
    expect(after).toBeGreaterThanOrEqual(before);
  });

  it("is zero for degenerate span or section properties", () => {
    const loads = [load(1000, 500, 1000)];
    expect(maxDeflection(0, loads, E, 1e6)).toBe(0);
    expect(maxDeflection(1000, loads, 0, 1e6)).toBe(0);
    expect(maxDeflection(1000, loads, E, -1)).toBe(0);
    expect(maxDeflection(1000, loads, Number.NaN, 1e6)).toBe(0);
    expect(maxDeflection(1000, [], E, 1e6)).toBe(0);
  });
});

describe("deflectionAt", () => {
  it("gives Pa²b²/3LEI under an offset load", () => {
    const L = 1000;
    const I = 1_000_000;
    const P = 2000;
    expect(deflectionAt(L, [load(P, 300, L)], E, I, 300)).toBeCloseTo(
      (P * 300 ** 2 * 700 ** 2) / (3 * L * E * I),
      9,
    );
  });

  it("mirrors the curve for x beyond the load", () => {
    const L = 1000;
    const I = 1_000_000;
    expect(deflectionAt(L, [load(2000, 300, L)], E, I, 700)).toBeCloseTo(
      deflectionAt(L, [load(2000, 700, L)], E, I, 300),
      12,
    );
  });

  it("is zero at the supports", () => {
    const L = 1000;
    expect(deflectionAt(L, [load(2000, 300, L)], E, 1e6, 0)).toBe(0);
    expect(deflectionAt(L, [load(2000, 300, L)], E, 1e6, L)).toBe(0);
  });
});

describe("sampling", () => {
  it("keeps the step between 10 and 50 mm", () => {
    expect(sampleStep(600)).toBe(10);
    expect(sampleStep(2400)).toBe(20);
    expect(sampleStep(12_000)).toBe(50);
  });

  it("samples from 0 to L inclusive", () => {
    expect(samplePositions(100)).toEqual([0, 10, 20, 30, 40, 50, 60, 70, 80, 90, 100]);
    expect(samplePositions(25)).toEqual([0, 10, 20, 25]);
    expect(samplePositions(0)).toEqual([0]);
  });
});
