/**
 * Sampling an expression across a viewport, one sample per pixel column.
 */

import type { Expression } from "./expression";
import type { Screen, Viewport } from "./viewport";

/** Pixel coordinates. */
export type Point = readonly [number, number];

/** A run of points drawn as one polyline. */
export type Segment = Point[];

export interface SampleOptions extends Screen {
  /** Value bound to `t` for every sample (default 0). */
  t?: number;
}

/** Samples further than this many screen heights away split the curve. */
export const FAR_SAMPLE_HEIGHTS = 4;

/**
 * Sample `expression` at every pixel column of the screen and group the
 * results into polylines.
 *
 * A NaN or infinite sample is skipped and ends the current polyline. A sample
 * more than four screen heights off starts a new polyline, so near-vertical
 * jumps at asymptotes are not joined. Polylines of fewer than two points are
 * dropped.
 */
export function sampleCurve(expression: Expression, viewport: Viewport, options: SampleOptions): Segment[] {
  const { t = 0 } = options;
  const step = viewport.unitsPerPixel(options);
  const limit = options.height * FAR_SAMPLE_HEIGHTS;

  const segments: Segment[] = [];
  let current: Segment = [];
  const flush = (): void => {
    if (current.length >= 2) {
      segments.push(current);
    }
    current = [];
  };

  for (let i = 0; i < options.width; i++) {
    const y = expression.evaluate(viewport.left + step * i, t);
    if (!Number.isFinite(y)) {
      flush();
      continue;
    }
    const py = viewport.toPixelY(y, options);
    if (Math.abs(py) > limit) {
      flush();
    }
    current.push([i, py]);
  }
  flush();

  return segments;
}

// ============================================================================
// Gridlines
// ============================================================================

export interface GridLines {
  /** Plane x positions of vertical lines. */
  xs: number[];
  /** Plane y positions of horizontal lines. */
  ys: number[];
}

export const MAX_GRID_LINES = 10_000;

/**
 * Multiples of `step` inside the viewport, in each direction.
 */
export function gridLines(viewport: Viewport, step: number): GridLines {
  if (!(step > 0) || !Number.isFinite(step)) {
    throw new RangeError(`Grid step must be a positive number, got ${step}`);
  }
  return {
    xs: multiplesWithin(viewport.left, viewport.right, step),
    ys: multiplesWithin(viewport.bottom, viewport.top, step),
  };
}

function multiplesWithin(low: number, high: number, step: number): number[] {
  const first = Math.ceil(low / step);
  const last = Math.floor(high / step);
  if (last - first + 1 > MAX_GRID_LINES) {
    throw new RangeError(`Grid step ${step} gives more than ${MAX_GRID_LINES} lines`);
  }
  const values: number[] = [];
  for (let n = first; n <= last; n++) {
    values.push(n * step);
  }
  return values;
}

// ============================================================================
// Saved Points
// ============================================================================

/** A point on the curve, in plane coordinates. */
export interface SavedPoint {
  readonly x: number;
  readonly y: number;
}

export function savePoint(expression: Expression, x: number, t: number = 0): SavedPoint {
  return { x, y: expression.evaluate(x, t) };
}
