import type { CoefficientVector, SampleSet } from "@core-types";
import { MAX_POINTS } from "./constants";
import { CapacityExceededError, DegenerateSampleError } from "./errors";
import { expandProduct } from "./permute";
import { assertFinite, assertNonEmpty } from "./utils";

export interface BuildOptions {
  maxPoints?: number;   // capped at MAX_POINTS
}

/** Lagrange basis denominator D_i = Π_{j≠i}(x_i − x_j) */
export function basisDenominator(samples: SampleSet, i: number): number {
  let d = 1.0;
  for (let j = 0; j < samples.length; j++) {
    if (j === i) continue;
    d *= samples[i].x - samples[j].x;
  }
  return d;
}

export function reverseCoefficients(c: readonly number[]): number[] {
  const out = new Array<number>(c.length);
  for (let j = 0; j < c.length; j++) out[j] = c[c.length - j - 1];
  return out;
}

export function validateSamples(samples: SampleSet, maxPoints: number = MAX_POINTS): void {
  assertNonEmpty(samples, "buildPolynomial");
  const limit = Math.min(maxPoints, MAX_POINTS);
  if (samples.length > limit) throw new CapacityExceededError(samples.length, limit);

  samples.forEach((s, i) => {
    assertFinite(s.x, `samples[${i}].x`, i);
    assertFinite(s.y, `samples[${i}].y`, i);
  });
}

/**
 * Coefficients of the unique degree n−1 polynomial through every sample,
 * lowest power first.
 */
export function buildPolynomial(samples: SampleSet, opts: BuildOptions = {}): number[] {
  validateSamples(samples, opts.maxPoints);

  const n = samples.length;
  const acc = new Array<number>(n).fill(0);

  for (let i = 0; i < n; i++) {
    const d = basisDenominator(samples, i);
    if (d === 0) {
      throw new DegenerateSampleError(
        "duplicate-x",
        `Duplicate x value ${samples[i].x} at sample ${i}`,
        i
      );
    }
    const c = samples[i].y / d;

    const others: number[] = [];
    for (let j = 0; j < n; j++) {
      if (j !== i) others.push(samples[j].x);
    }

    const term = expandProduct(others);
    for (let k = 0; k < term.length; k++) {
      acc[k] += c * term[k];
    }
  }

  // accumulated with the highest power first
  const factor = reverseCoefficients(acc);
  factor.forEach((f, k) => assertFinite(f, `coefficient[${k}]`));
  return factor;
}

export function degree(coefficients: CoefficientVector): number {
  return coefficients.length - 1;
}
