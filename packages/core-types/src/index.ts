/** One observation: x = λ, y = dG/dλ for thermodynamic integration input */
export interface Sample {
  x: number;
  y: number;
}

/** Samples in the caller's order; never sorted internally */
export type SampleSet = readonly Sample[];

/** Index i holds the coefficient of x^i */
export type CoefficientVector = readonly number[];

export interface EstimatePoint {
  x: number;
  estimate: number;
}

export interface FreeEnergyEstimate {
  lagrange: number;   // analytic integral of the fitted polynomial
  trapezoid: number;  // trapezoidal quadrature of the raw samples
}
