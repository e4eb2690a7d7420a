/**
 * Tests for curve sampling, gridlines, saved points and Riemann sums.
 */
import { describe, it, expect } from "vitest";

import { compile, Viewport, sampleCurve, gridLines, savePoint, riemannSum } from "../src/index";

describe("Curve Sampling", () => {
  it("samples one point per pixel column", () => {
    const segments = sampleCurve(compile("x"), new Viewport([0, 4], [0, 4]), { width: 4, height: 4 });
    expect(segments).toEqual([
      [
        [0, 4],
        [1, 3],
        [2, 2],
        [3, 1],
      ],
    ]);
  });

  it("binds t for every sample", () => {
    const segments = sampleCurve(compile("t"), new Viewport([0, 2], [0, 4]), { width: 2, height: 4, t: 2 });
    expect(segments).toEqual([
      [
        [0, 2],
        [1, 2],
      ],
    ]);
  });

  it("breaks the curve at non-finite samples and drops single points", () => {
    // samples at x = -2, -1, 0, 1: the last one is left on its own
    const segments = sampleCurve(compile("1/x"), new Viewport([-2, 2], [-2, 2]), { width: 4, height: 4 });
    expect(segments).toEqual([
      [
        [0, 2.5],
        [1, 3],
      ],
    ]);
  });

  it("starts a new polyline at a sample far off screen", () => {
    // py = 1 - 2x: 1, -1, -3, -5; only the last is beyond four heights
    const segments = sampleCurve(compile("x"), new Viewport([0, 4], [0, 0.5]), { width: 4, height: 1 });
    expect(segments).toEqual([
      [
        [0, 1],
        [1, -1],
        [2, -3],
      ],
    ]);
  });

  it("returns nothing for a curve that is never defined", () => {
    expect(sampleCurve(compile("log(-1)"), new Viewport([0, 1], [0, 1]), { width: 10, height: 10 })).toEqual([]);
  });
});

describe("Gridlines", () => {
  it("lists multiples of the step inside the viewport", () => {
    const grid = gridLines(new Viewport([-1, 1], [0, 2.5]), 1);
    expect(grid.xs).toEqual([-1, 0, 1]);
    expect(grid.ys).toEqual([0, 1, 2]);
  });

  it("rejects a step that is not positive", () => {
    const viewport = new Viewport([-1, 1], [-1, 1]);
    expect(() => gridLines(viewport, 0)).toThrow(RangeError);
    expect(() => gridLines(viewport, -1)).toThrow(RangeError);
    expect(() => gridLines(viewport, NaN)).toThrow(RangeError);
  });

  it("rejects a step that gives too many lines", () => {
    expect(() => gridLines(new Viewport([-1, 1], [-1, 1]), 0.0001)).toThrow(RangeError);
  });
});

describe("Saved Points", () => {
  it("evaluates the curve at the saved x", () => {
    expect(savePoint(compile("x^2"), 3)).toEqual({ x: 3, y: 9 });
    expect(savePoint(compile("x + t"), 1, 2)).toEqual({ x: 1, y: 3 });
  });
});

describe("Riemann Sums", () => {
  it("sums midpoint rectangles", () => {
    expect(riemannSum(compile("x"), 0, 2, 4)).toBe(2);
    expect(riemannSum(compile("x^2"), 0, 3, 3)).toBe(8.75);
  });

  it("binds t", () => {
    expect(riemannSum(compile("t"), 0, 2, 2, 3)).toBe(6);
  });

  it("is zero over an empty interval", () => {
    expect(riemannSum(compile("x"), 1, 1, 10)).toBe(0);
  });

  it("rejects reversed bounds and bad subdivisions", () => {
    const expression = compile("x");
    expect(() => riemannSum(expression, 2, 1, 4)).toThrow(RangeError);
    expect(() => riemannSum(expression, 0, 1, 0)).toThrow(RangeError);
    expect(() => riemannSum(expression, 0, 1, 1.5)).toThrow("Subdivisions must be a positive integer, got 1.5");
  });
});
