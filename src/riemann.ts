/**
 * Midpoint Riemann sums.
 */

import type { Expression } from "./expression";

/**
 * Approximate the integral of f(x, t) over [left, right] with `subdivisions`
 * rectangles, each sampled at its midpoint.
 */
export function riemannSum(
  expression: Expression,
  left: number,
  right: number,
  subdivisions: number,
  t: number = 0
): number {
  if (left > right) {
    throw new RangeError("Left bound must not be greater than right bound");
  }
  if (!Number.isInteger(subdivisions) || subdivisions <= 0) {
    throw new RangeError(`Subdivisions must be a positive integer, got ${subdivisions}`);
  }
  if (left === right) {
    return 0;
  }

  const dx = (right - left) / subdivisions;
  let sum = 0;
  for (let i = 0; i < subdivisions; i++) {
    sum += dx * expression.evaluate(left + dx * (i + 0.5), t);
  }
  return sum;
}
