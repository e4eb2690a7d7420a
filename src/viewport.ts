/**
 * Viewport - the visible window onto the plane.
 * Immutable: zoom() and shift() return a new Viewport.
 */

export type Interval = readonly [number, number];

export interface Screen {
  readonly width: number;
  readonly height: number;
}

export class Viewport {
  /** [left, right] */
  readonly domain: Interval;
  /** [bottom, top] */
  readonly range: Interval;
  private readonly origin: Viewport | undefined;

  constructor(domain: Interval, range: Interval, origin?: Viewport) {
    if (!(domain[0] < domain[1])) {
      throw new RangeError(`Empty domain [${domain[0]}, ${domain[1]}]`);
    }
    if (!(range[0] < range[1])) {
      throw new RangeError(`Empty range [${range[0]}, ${range[1]}]`);
    }
    this.domain = domain;
    this.range = range;
    this.origin = origin;
  }

  get left(): number {
    return this.domain[0];
  }

  get right(): number {
    return this.domain[1];
  }

  get bottom(): number {
    return this.range[0];
  }

  get top(): number {
    return this.range[1];
  }

  /**
   * Grow both intervals by `by / 2` on each side; a negative `by` zooms in.
   * A zoom that would empty or invert either interval is ignored.
   */
  zoom(by: number): Viewport {
    const half = by / 2;
    const domain: Interval = [this.left - half, this.right + half];
    const range: Interval = [this.bottom - half, this.top + half];
    if (!(domain[0] < domain[1] && range[0] < range[1])) {
      return this;
    }
    return new Viewport(domain, range, this.origin ?? this);
  }

  /** Pan by the given amounts in plane units. */
  shift(dx: number, dy: number): Viewport {
    return new Viewport(
      [this.left + dx, this.right + dx],
      [this.bottom + dy, this.top + dy],
      this.origin ?? this
    );
  }

  /** The viewport this one was zoomed or panned from. */
  reset(): Viewport {
    return this.origin ?? this;
  }

  /** Plane units covered by one pixel column. */
  unitsPerPixel(screen: Screen): number {
    return (this.right - this.left) / screen.width;
  }

  toPixelX(x: number, screen: Screen): number {
    return ((x - this.left) / (this.right - this.left)) * screen.width;
  }

  /** Pixel rows grow downward, so `top` maps to 0 and `bottom` to the height. */
  toPixelY(y: number, screen: Screen): number {
    return screen.height - ((y - this.bottom) / (this.top - this.bottom)) * screen.height;
  }

  fromPixel(px: number, py: number, screen: Screen): [number, number] {
    const x = this.left + (px / screen.width) * (this.right - this.left);
    const y = this.bottom + ((screen.height - py) / screen.height) * (this.top - this.bottom);
    return [x, y];
  }
}

// ============================================================================
// Interval Parsing
// ============================================================================

const INTERVAL_PATTERN = /^\[(-?\d+\.?\d*),\s*(-?\d+\.?\d*)\]$/;

/**
 * Parse an interval written as "[a, b]". Returns null when the text does not
 * match or the interval is empty.
 */
export function parseInterval(text: string): Interval | null {
  const match = INTERVAL_PATTERN.exec(text.trim());
  if (match === null) {
    return null;
  }
  const low = Number(match[1]);
  const high = Number(match[2]);
  return low < high ? [low, high] : null;
}
