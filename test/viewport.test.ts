/**
 * Tests for the viewport and interval parsing.
 */
import { describe, it, expect } from "vitest";

import { Viewport, parseInterval } from "../src/index";

const screen = { width: 100, height: 50 };

describe("Viewport Tests", () => {
  it("maps plane coordinates to pixels", () => {
    const viewport = new Viewport([-1, 1], [-1, 1]);
    expect(viewport.toPixelX(-1, screen)).toBe(0);
    expect(viewport.toPixelX(0, screen)).toBe(50);
    expect(viewport.toPixelX(1, screen)).toBe(100);
    expect(viewport.toPixelY(1, screen)).toBe(0);
    expect(viewport.toPixelY(-1, screen)).toBe(50);
    expect(viewport.toPixelY(0, screen)).toBe(25);
  });

  it("maps pixels back to plane coordinates", () => {
    const viewport = new Viewport([-1, 1], [-1, 1]);
    expect(viewport.fromPixel(50, 25, screen)).toEqual([0, 0]);
    expect(viewport.fromPixel(0, 0, screen)).toEqual([-1, 1]);
  });

  it("reports the plane width of a pixel column", () => {
    expect(new Viewport([-1, 1], [0, 1]).unitsPerPixel(screen)).toBe(0.02);
  });

  it("zooms out and in", () => {
    const viewport = new Viewport([-1, 1], [-1, 1]);
    const out = viewport.zoom(2);
    expect(out.domain).toEqual([-2, 2]);
    expect(out.range).toEqual([-2, 2]);
    const closer = viewport.zoom(-1);
    expect(closer.domain).toEqual([-0.5, 0.5]);
  });

  it("ignores a zoom that would empty the window", () => {
    const viewport = new Viewport([-1, 1], [-1, 1]);
    expect(viewport.zoom(-2)).toBe(viewport);
    expect(viewport.zoom(-5)).toBe(viewport);
  });

  it("shifts", () => {
    const shifted = new Viewport([-1, 1], [-1, 1]).shift(1, -1);
    expect(shifted.domain).toEqual([0, 2]);
    expect(shifted.range).toEqual([-2, 0]);
    expect(shifted.left).toBe(0);
    expect(shifted.right).toBe(2);
    expect(shifted.bottom).toBe(-2);
    expect(shifted.top).toBe(0);
  });

  it("resets to the viewport it started from", () => {
    const viewport = new Viewport([-1, 1], [-1, 1]);
    expect(viewport.reset()).toBe(viewport);
    expect(viewport.zoom(2).shift(1, 0).zoom(-1).reset()).toBe(viewport);
  });

  it("rejects empty intervals", () => {
    expect(() => new Viewport([1, 1], [0, 1])).toThrow(RangeError);
    expect(() => new Viewport([0, 1], [2, 1])).toThrow("Empty range [2, 1]");
  });
});

describe("Interval Parsing", () => {
  it("parses bracketed pairs", () => {
    expect(parseInterval("[-2, 3.5]")).toEqual([-2, 3.5]);
    expect(parseInterval("[0,1]")).toEqual([0, 1]);
    expect(parseInterval(" [-1.5, -0.5] ")).toEqual([-1.5, -0.5]);
  });

  it("rejects malformed text", () => {
    expect(parseInterval("1, 2")).toBeNull();
    expect(parseInterval("[a, b]")).toBeNull();
    expect(parseInterval("[1, 2, 3]")).toBeNull();
    expect(parseInterval("")).toBeNull();
  });

  it("rejects empty or inverted intervals", () => {
    expect(parseInterval("[1, 1]")).toBeNull();
    expect(parseInterval("[2, 1]")).toBeNull();
  });
});
