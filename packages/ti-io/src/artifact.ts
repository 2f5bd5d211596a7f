import type { Sample } from "@core-types";
import type { Lagrange } from "@lagrange-core/lagrange";
import { degree } from "@lagrange-core/polynomial";

export type FitArtifact = {
  meta: { createdAt: string; method: string; degree: number };
  samples: Sample[];
  coefficients: number[];
  integrals: { lagrange: number; trapezoid: number };
};

export function buildFitArtifact(fit: Lagrange, method = "lagrange"): FitArtifact {
  const coefficients = [...fit.getPolynomial()];
  return {
    meta: { createdAt: new Date().toISOString(), method, degree: degree(coefficients) },
    samples: fit.samples.map((s) => ({ x: s.x, y: s.y })),
    coefficients,
    integrals: fit.freeEnergy(),
  };
}
