export type DegenerateReason = "empty" | "duplicate-x" | "non-finite" | "length-mismatch";

/** Sample set that cannot produce a finite interpolating polynomial */
export class DegenerateSampleError extends Error {
  readonly reason: DegenerateReason;
  readonly index?: number;

  constructor(reason: DegenerateReason, message: string, index?: number) {
    super(message);
    this.name = "DegenerateSampleError";
    this.reason = reason;
    this.index = index;
  }
}

/** More points than the subset-mask expansion can enumerate */
export class CapacityExceededError extends Error {
  readonly count: number;
  readonly limit: number;

  constructor(count: number, limit: number) {
    super(`Too many points: ${count} samples exceeds the limit of ${limit}`);
    this.name = "CapacityExceededError";
    this.count = count;
    this.limit = limit;
  }
}
