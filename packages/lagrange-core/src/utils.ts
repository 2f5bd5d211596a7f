import type { SampleSet } from "@core-types";
import { DegenerateSampleError } from "./errors";

export function assertFinite(x: number, tag: string, index?: number): void {
  if (!Number.isFinite(x)) {
    throw new DegenerateSampleError("non-finite", `Non-finite value at ${tag}: ${x}`, index);
  }
}

export function assertNonEmpty(samples: SampleSet, tag: string): void {
  if (samples.length === 0) {
    throw new DegenerateSampleError("empty", `Empty sample set at ${tag}`);
  }
}

/** Number of set bits in the low 32 bits of n */
export function popcount(n: number): number {
  let v = n >>> 0;
  v = v - ((v >>> 1) & 0x55555555);
  v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
  v = (v + (v >>> 4)) & 0x0f0f0f0f;
  return Math.imul(v, 0x01010101) >>> 24;
}
