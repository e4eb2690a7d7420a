/**
 * SVG rendering of a curve: gridlines, axes, the sampled polylines, saved
 * points and the equation/domain/range labels.
 */

import type { Expression } from "./expression";
import { MarkupBuilder } from "./markup-builder";
import { type SavedPoint, type Segment, gridLines, sampleCurve } from "./sample";
import type { Screen, Viewport } from "./viewport";

export interface RenderOptions extends Screen {
  /** Value bound to `t` (default 0). */
  t?: number;
  /** Spacing of gridlines in plane units; no grid when omitted. */
  step?: number | null;
  /** Draw the x and y axes (default true). */
  axis?: boolean;
  /** Digits after the decimal point in labels (default 2). */
  precision?: number;
  saved?: readonly SavedPoint[];
  color?: string;
}

const LINE_HEIGHT = 12;

/**
 * Format a plane value for a label with a fixed number of decimals.
 */
export function formatValue(value: number, precision: number): string {
  return Number.isFinite(value) ? value.toFixed(precision) : String(value);
}

// Two decimals are plenty for pixel coordinates
function px(value: number): string {
  return String(Math.round(value * 100) / 100);
}

function polylinePoints(segment: Segment): string {
  return segment.map(([x, y]) => `${px(x)},${px(y)}`).join(" ");
}

export function renderSvg(expression: Expression, viewport: Viewport, options: RenderOptions): string {
  const { width, height, t = 0, step = null, axis = true, precision = 2, saved = [], color = "black" } = options;
  const screen: Screen = { width, height };
  const out = new MarkupBuilder();

  out.open("svg", {
    xmlns: "http://www.w3.org/2000/svg",
    width,
    height,
    viewBox: `0 0 ${width} ${height}`,
  });
  out.empty("rect", { x: 0, y: 0, width, height, fill: "white" });

  if (step !== null) {
    const grid = gridLines(viewport, step);
    out.open("g", { stroke: "#dddddd", "stroke-width": 1 });
    for (const x of grid.xs) {
      const sx = px(viewport.toPixelX(x, screen));
      out.empty("line", { x1: sx, y1: 0, x2: sx, y2: height });
    }
    for (const y of grid.ys) {
      const sy = px(viewport.toPixelY(y, screen));
      out.empty("line", { x1: 0, y1: sy, x2: width, y2: sy });
    }
    out.close("g");
  }

  if (axis) {
    out.open("g", { stroke: "#808080", "stroke-width": 1 });
    if (viewport.bottom <= 0 && 0 <= viewport.top) {
      const sy = px(viewport.toPixelY(0, screen));
      out.empty("line", { x1: 0, y1: sy, x2: width, y2: sy });
    }
    if (viewport.left <= 0 && 0 <= viewport.right) {
      const sx = px(viewport.toPixelX(0, screen));
      out.empty("line", { x1: sx, y1: 0, x2: sx, y2: height });
    }
    out.close("g");
  }

  out.open("g", { fill: "none", stroke: color, "stroke-width": 1 });
  for (const segment of sampleCurve(expression, viewport, { width, height, t })) {
    out.empty("polyline", { points: polylinePoints(segment) });
  }
  out.close("g");

  const visible = saved.filter((point) => Number.isFinite(point.y));
  if (visible.length > 0) {
    out.open("g", { fill: "red", "font-family": "Courier New, monospace", "font-size": LINE_HEIGHT });
    for (const point of visible) {
      const sx = px(viewport.toPixelX(point.x, screen));
      const sy = px(viewport.toPixelY(point.y, screen));
      out.empty("circle", { cx: sx, cy: sy, r: 3 });
      out.text("text", { x: sx, y: sy }, `(${formatValue(point.x, precision)}, ${formatValue(point.y, precision)})`);
    }
    out.close("g");
  }

  const domain = `[${formatValue(viewport.left, precision)}, ${formatValue(viewport.right, precision)}]`;
  const range = `[${formatValue(viewport.bottom, precision)}, ${formatValue(viewport.top, precision)}]`;
  out.open("g", { fill: "black", "font-family": "Courier New, monospace", "font-size": LINE_HEIGHT });
  out.text("text", { x: 0, y: LINE_HEIGHT }, `Equation: ${expression.source}`);
  out.text("text", { x: 0, y: LINE_HEIGHT * 2 }, `Domain: ${domain}`);
  out.text("text", { x: 0, y: LINE_HEIGHT * 3 }, `Range: ${range}`);
  out.close("g");

  out.close("svg");
  return out.build();
}
