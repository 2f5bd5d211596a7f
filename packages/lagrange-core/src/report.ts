import type { CoefficientVector, EstimatePoint, FreeEnergyEstimate } from "@core-types";
import {
  COEFFICIENT_DIGITS,
  INTEGRAL_DIGITS,
  PLOT_ESTIMATE_DIGITS,
  PLOT_X_DIGITS,
} from "./constants";

export interface PlotFormat {
  xDigits: number;
  estimateDigits: number;
}

export const DEFAULT_PLOT_FORMAT: PlotFormat = {
  xDigits: PLOT_X_DIGITS,
  estimateDigits: PLOT_ESTIMATE_DIGITS,
};

export function formatPolynomial(
  coefficients: CoefficientVector,
  digits = COEFFICIENT_DIGITS
): string[] {
  const lines = ["Degree, Coefficients"];
  coefficients.forEach((c, i) => {
    lines.push(`${String(i).padStart(6)}, ${c.toFixed(digits)}`);
  });
  return lines;
}

export function formatArea(area: number, digits = INTEGRAL_DIGITS): string {
  return `area under the curve: ${area.toFixed(digits)}`;
}

export function formatFreeEnergy(est: FreeEnergyEstimate, digits = INTEGRAL_DIGITS): string[] {
  return [
    "",
    "Free energy difference",
    ` Lagrange: ${est.lagrange.toFixed(digits)}`,
    `Trapezoid: ${est.trapezoid.toFixed(digits)}`,
  ];
}

export function formatEstimate(p: EstimatePoint, fmt: PlotFormat = DEFAULT_PLOT_FORMAT): string {
  return `${p.x.toFixed(fmt.xDigits)}, ${p.estimate.toFixed(fmt.estimateDigits)}`;
}
