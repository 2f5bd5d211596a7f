import type {
  CoefficientVector,
  EstimatePoint,
  FreeEnergyEstimate,
  Sample,
  SampleSet,
} from "@core-types";
import { MAX_POINTS } from "./constants";
import { DegenerateSampleError } from "./errors";
import { estimateGrid, evaluatePolynomial } from "./evaluate";
import { integratePolynomial, sampleBounds, trapezoid } from "./integrate";
import { buildPolynomial } from "./polynomial";
import { formatArea, formatPolynomial } from "./report";

export type ReportSink = (line: string) => void;

export interface LagrangeOptions {
  maxPoints?: number;
  sink?: ReportSink;
}

/**
 * Lagrange interpolating polynomial over one sample set.
 *
 * Owns a copy of the samples and the coefficients built from them. Every load
 * rebuilds the coefficients; a load that fails leaves the fit empty.
 */
export class Lagrange {
  private sample: SampleSet = [];
  private factor: CoefficientVector = [];
  private readonly maxPoints: number;
  private readonly sink: ReportSink;

  constructor(samples?: SampleSet, opts: LagrangeOptions = {}) {
    this.maxPoints = opts.maxPoints ?? MAX_POINTS;
    this.sink = opts.sink ?? ((line) => console.log(line));
    if (samples) this.loadData(samples);
  }

  static fromArrays(xs: readonly number[], ys: readonly number[], opts: LagrangeOptions = {}): Lagrange {
    const fit = new Lagrange(undefined, opts);
    fit.loadArrays(xs, ys);
    return fit;
  }

  get samples(): SampleSet {
    return this.sample;
  }

  get sampleCount(): number {
    return this.sample.length;
  }

  loadData(samples: SampleSet): SampleSet {
    this.clearData();
    const copy = samples.map((s): Sample => Object.freeze({ x: s.x, y: s.y }));
    const factor = buildPolynomial(copy, { maxPoints: this.maxPoints });
    this.sample = Object.freeze(copy);
    this.factor = Object.freeze(factor);
    return this.sample;
  }

  loadArrays(xs: readonly number[], ys: readonly number[]): SampleSet {
    if (xs.length !== ys.length) {
      this.clearData();
      throw new DegenerateSampleError(
        "length-mismatch",
        `x/y length mismatch: ${xs.length} vs ${ys.length}`
      );
    }
    return this.loadData(xs.map((x, i) => ({ x, y: ys[i] })));
  }

  getPolynomial(print = false): CoefficientVector {
    if (print) formatPolynomial(this.factor).forEach((line) => this.sink(line));
    return this.factor;
  }

  /** Analytic integral between the first and last sample's x */
  doIntegral(print = false): number {
    const { lower, upper } = sampleBounds(this.sample);
    const area = integratePolynomial(this.factor, lower, upper);
    if (print) this.sink(formatArea(area));
    return area;
  }

  /** Trapezoidal quadrature of the raw samples; ignores the fit */
  doQuadrature(print = false): number {
    const area = trapezoid(this.sample);
    if (print) this.sink(formatArea(area));
    return area;
  }

  freeEnergy(): FreeEnergyEstimate {
    return { lagrange: this.doIntegral(), trapezoid: this.doQuadrature() };
  }

  evaluate(x: number): number {
    return evaluatePolynomial(this.factor, x);
  }

  estimates(steps: number): Iterable<EstimatePoint> {
    return estimateGrid(this.factor, steps);
  }

  private clearData(): void {
    this.sample = [];
    this.factor = [];
  }
}
