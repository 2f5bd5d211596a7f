import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  basisDenominator,
  buildPolynomial,
  reverseCoefficients,
} from "../src/polynomial";
import { evaluatePolynomial } from "../src/evaluate";
import { CapacityExceededError, DegenerateSampleError } from "../src/errors";

const PARABOLA = [
  { x: 0, y: 1 },
  { x: 1, y: 2 },
  { x: 2, y: 5 },
];

describe("buildPolynomial", () => {
  it("recovers y = x² + 1 from three points", () => {
    const c = buildPolynomial(PARABOLA);
    expect(c).toHaveLength(3);
    expect(c[0]).toBeCloseTo(1, 12);
    expect(c[1]).toBeCloseTo(0, 12);
    expect(c[2]).toBeCloseTo(1, 12);
  });

  it("same coefficients whatever the sample order", () => {
    const c = buildPolynomial([PARABOLA[2], PARABOLA[0], PARABOLA[1]]);
    expect(c[0]).toBeCloseTo(1, 12);
    expect(c[1]).toBeCloseTo(0, 12);
    expect(c[2]).toBeCloseTo(1, 12);
  });

  it("is deterministic", () => {
    const s = [{ x: 0, y: 3.2 }, { x: 0.3, y: -1.7 }, { x: 0.7, y: 0.4 }, { x: 1, y: 2.9 }];
    expect(buildPolynomial(s)).toEqual(buildPolynomial(s));
  });

  it("single sample gives a constant", () => {
    expect(buildPolynomial([{ x: 0.5, y: 3 }])).toEqual([3]);
  });

  it("basis denominator is Π(x_i − x_j)", () => {
    expect(basisDenominator(PARABOLA, 0)).toBe(2);
    expect(basisDenominator(PARABOLA, 1)).toBe(-1);
    expect(basisDenominator(PARABOLA, 2)).toBe(2);
  });

  it("reversing twice is identity", () => {
    const c = [1.5, -2, 0.25, 8];
    expect(reverseCoefficients(c)).toEqual([8, 0.25, -2, 1.5]);
    expect(reverseCoefficients(reverseCoefficients(c))).toEqual(c);
  });

  it("interpolates every sample (random distinct λ grids)", () => {
    const arb = fc
      .uniqueArray(fc.integer({ min: 0, max: 20 }), { minLength: 2, maxLength: 6 })
      .chain((ks) =>
        fc.tuple(
          fc.constant(ks.map((k) => k / 20)),
          fc.array(fc.integer({ min: -5000, max: 5000 }), { minLength: ks.length, maxLength: ks.length })
        )
      );

    fc.assert(fc.property(arb, ([xs, ys]) => {
      const samples = xs.map((x, i) => ({ x, y: ys[i] / 100 }));
      const c = buildPolynomial(samples);
      if (c.length !== samples.length) return false;
      return samples.every((s) => Math.abs(evaluatePolynomial(c, s.x) - s.y) <= 1e-6 * (1 + Math.abs(s.y)));
    }), { numRuns: 200 });
  });
});

describe("buildPolynomial errors", () => {
  it("duplicate x is reported, not turned into NaN", () => {
    const dup = [{ x: 0, y: 1 }, { x: 1, y: 2 }, { x: 1, y: 3 }];
    try {
      buildPolynomial(dup);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(DegenerateSampleError);
      if (e instanceof DegenerateSampleError) {
        expect(e.reason).toBe("duplicate-x");
        expect(e.index).toBe(1);
      }
    }
  });

  it("empty set", () => {
    expect(() => buildPolynomial([])).toThrow(/Empty sample set/);
  });

  it("non-finite input", () => {
    expect(() => buildPolynomial([{ x: 0, y: NaN }, { x: 1, y: 1 }])).toThrow(/Non-finite value at samples\[0\]\.y/);
  });

  it("overflowing products abort the fit", () => {
    const huge = [{ x: 0, y: 1 }, { x: 1e200, y: 1 }, { x: 2e200, y: 1 }];
    try {
      buildPolynomial(huge);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(DegenerateSampleError);
      if (e instanceof DegenerateSampleError) {
        expect(e.reason).toBe("non-finite");
        expect(e.message).toMatch(/^Non-finite value at coefficient\[/);
      }
    }
  });

  it("more samples than maxPoints", () => {
    const s = [0, 0.25, 0.5, 0.75].map((x) => ({ x, y: x }));
    expect(() => buildPolynomial(s, { maxPoints: 3 })).toThrow(CapacityExceededError);
    expect(() => buildPolynomial(s, { maxPoints: 3 })).toThrow("Too many points: 4 samples exceeds the limit of 3");
  });
});
