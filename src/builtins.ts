/**
 * Builtin operators and functions.
 *
 * Every implementation is total over doubles: division by zero, poles and
 * domain violations produce Infinity or NaN rather than throwing.
 */

import type { BinaryOp, FunctionName } from "./ast";

export type UnaryImpl = (value: number) => number;
export type BinaryImpl = (left: number, right: number) => number;

// ============================================================================
// Operators
// ============================================================================

export const BINARY_OPS: Readonly<Record<BinaryOp, BinaryImpl>> = {
  Add: (a, b) => a + b,
  Sub: (a, b) => a - b,
  Mul: (a, b) => a * b,
  // IEEE: nonzero / 0 is ±Infinity, 0 / 0 is NaN
  Div: (a, b) => a / b,
  // Remainder takes the sign of the dividend (C fmod), not of the divisor
  Mod: (a, b) => a % b,
  Pow: power,
};

/**
 * IEEE pow. Unlike `**`, a base of 1 gives 1 for any exponent, NaN included,
 * and so does -1 raised to ±Infinity. A negative base with a fractional
 * exponent is NaN; there are no complex results.
 */
export function power(base: number, exponent: number): number {
  if (base === 1 || (base === -1 && (exponent === Infinity || exponent === -Infinity))) {
    return 1;
  }
  return base ** exponent;
}

// ============================================================================
// Functions
// ============================================================================

export const FUNCTIONS: Readonly<Record<FunctionName, UnaryImpl>> = {
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
  asin: Math.asin,
  acos: Math.acos,
  atan: Math.atan,
  sinh: Math.sinh,
  cosh: Math.cosh,
  tanh: Math.tanh,
  asinh: Math.asinh,
  acosh: Math.acosh,
  atanh: Math.atanh,
  rad: (v) => (v * Math.PI) / 180,
  deg: (v) => (v * 180) / Math.PI,
  log: naturalLog,
  abs: Math.abs,
  round: roundHalfEven,
  sign,
};

/**
 * Natural logarithm, NaN for every non-positive argument including zero.
 */
export function naturalLog(value: number): number {
  return value > 0 ? Math.log(value) : NaN;
}

/**
 * Round to the nearest integer, ties to even: 0.5 -> 0, 1.5 -> 2, -2.5 -> -2.
 */
export function roundHalfEven(value: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction < 0.5) {
    return floor;
  }
  if (fraction > 0.5) {
    return floor + 1;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * -1, 0 or 1. Both zeros give 0; NaN stays NaN.
 */
export function sign(value: number): number {
  if (value < 0) return -1;
  if (value > 0) return 1;
  if (value === 0) return 0;
  return NaN;
}
