import type { CoefficientVector, SampleSet } from "@core-types";
import { DegenerateSampleError } from "./errors";
import { assertNonEmpty } from "./utils";

/** Definite integral of Σ factor[i]·x^i over [lower, upper] */
export function integratePolynomial(
  coefficients: CoefficientVector,
  lower: number,
  upper: number
): number {
  if (coefficients.length === 0) {
    throw new DegenerateSampleError("empty", "Empty coefficient vector at integratePolynomial");
  }
  let area = 0.0;
  for (let i = 0; i < coefficients.length; i++) {
    const power = i + 1;
    area += (Math.pow(upper, power) / power) * coefficients[i] -
      (Math.pow(lower, power) / power) * coefficients[i];
  }
  return area;
}

/**
 * Domain bounds by insertion order: first and last sample's x.
 * Callers wanting [min, max] sort beforehand.
 */
export function sampleBounds(samples: SampleSet): { lower: number; upper: number } {
  assertNonEmpty(samples, "sampleBounds");
  return { lower: samples[0].x, upper: samples[samples.length - 1].x };
}

/** Trapezoidal rule over consecutive sample pairs; one sample → 0 */
export function trapezoid(samples: SampleSet): number {
  assertNonEmpty(samples, "trapezoid");
  let area = 0.0;
  for (let i = 1; i < samples.length; i++) {
    const a = samples[i - 1], b = samples[i];
    area += (b.y + a.y) * 0.5 * (b.x - a.x);
  }
  return area;
}
