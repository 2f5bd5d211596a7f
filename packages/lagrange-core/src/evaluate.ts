import type { CoefficientVector, EstimatePoint } from "@core-types";

/** Σ factor[i]·x^i, evaluated term by term */
export function evaluatePolynomial(coefficients: CoefficientVector, x: number): number {
  let y = 0.0;
  for (let i = 0; i < coefficients.length; i++) {
    y += Math.pow(x, i) * coefficients[i];
  }
  return y;
}

/**
 * steps + 1 estimates at x = k/steps on the unit interval.
 * Re-iterating the result starts over from x = 0.
 */
export function estimateGrid(coefficients: CoefficientVector, steps: number): Iterable<EstimatePoint> {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new RangeError(`steps must be a positive integer, got ${steps}`);
  }
  const factor = [...coefficients];
  return {
    *[Symbol.iterator]() {
      for (let k = 0; k <= steps; k++) {
        const x = k / steps;
        yield { x, estimate: evaluatePolynomial(factor, x) };
      }
    },
  };
}
