import { MASK_BITS } from "./constants";
import { CapacityExceededError } from "./errors";
import { popcount } from "./utils";

/**
 * Expand Π(t − x_j) by enumerating every subset of the factors.
 *
 * Each subset mask picks the factors that contribute −x_j instead of t; its
 * product lands in the slot given by the number of picked factors. Slot k is
 * therefore the coefficient of t^(n−k): slot 0 is 1, slot n is Π(−x_j).
 *
 * No range guard: for many, large or clustered x the products overflow or
 * cancel badly, and the result is only as good as double precision allows.
 */
export function expandProduct(others: readonly number[]): number[] {
  const n = others.length;
  if (n > MASK_BITS) throw new CapacityExceededError(n + 1, MASK_BITS);

  const term = new Array<number>(n + 1).fill(0);
  const total = 2 ** n;

  for (let mask = 0; mask < total; mask++) {
    let unit = 1.0;
    for (let j = 0; j < n; j++) {
      if ((mask >>> j) & 1) unit *= -others[j];
    }
    term[popcount(mask)] += unit;
  }

  return term;
}
