import { describe, it, expect } from "vitest";
import { integratePolynomial, sampleBounds, trapezoid } from "../src/integrate";
import { DegenerateSampleError } from "../src/errors";

describe("integratePolynomial", () => {
  it("∫₀² (x² + 1) dx = 14/3", () => {
    expect(integratePolynomial([1, 0, 1], 0, 2)).toBeCloseTo(14 / 3, 12);
  });

  it("swapped bounds flip the sign", () => {
    expect(integratePolynomial([1, 0, 1], 2, 0)).toBeCloseTo(-14 / 3, 12);
  });

  it("rejects an empty vector", () => {
    expect(() => integratePolynomial([], 0, 1)).toThrow(DegenerateSampleError);
  });
});

describe("trapezoid", () => {
  it("coarse parabola overestimates", () => {
    const s = [{ x: 0, y: 1 }, { x: 1, y: 2 }, { x: 2, y: 5 }];
    expect(trapezoid(s)).toBe(5);
  });

  it("walks samples in insertion order", () => {
    const s = [{ x: 2, y: 5 }, { x: 0, y: 1 }, { x: 1, y: 2 }];
    expect(trapezoid(s)).toBe(-4.5);
  });

  it("single sample has no area", () => {
    expect(trapezoid([{ x: 0.3, y: 7 }])).toBe(0);
  });

  it("empty set is an error", () => {
    expect(() => trapezoid([])).toThrow(/Empty sample set at trapezoid/);
  });
});

describe("sampleBounds", () => {
  it("first and last by insertion order, not min/max", () => {
    const s = [{ x: 0.5, y: 0 }, { x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0.25, y: 0 }];
    expect(sampleBounds(s)).toEqual({ lower: 0.5, upper: 0.25 });
  });
});
