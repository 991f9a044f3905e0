import { APPROX_EPSILON, resolveEpsilon, type ToleranceOptions } from "./scalar.js";
import type { Point2 } from "./point2.js";
import type { Size2 } from "./size2.js";
import type { Vec2 } from "./vec2.js";

/**
 * Axis-aligned rectangle given by its four edges. `top` is the smaller y on
 * a Y-down surface.
 */
export interface Rect2 {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export type RectCorner = "topLeft" | "topRight" | "bottomLeft" | "bottomRight";

/**
 * Margin around a rectangle; a single number applies to every side.
 */
export type Thickness = number | { left: number; top: number; right: number; bottom: number };

function sides(t: Thickness): { left: number; top: number; right: number; bottom: number } {
  return typeof t === "number" ? { left: t, top: t, right: t, bottom: t } : t;
}

function normalized(r: Rect2): Rect2 {
  return {
    left: Math.min(r.left, r.right),
    top: Math.min(r.top, r.bottom),
    right: Math.max(r.left, r.right),
    bottom: Math.max(r.top, r.bottom),
  };
}

const INFINITE: Readonly<Rect2> = Object.freeze({
  left: -Infinity,
  top: -Infinity,
  right: Infinity,
  bottom: Infinity,
});

export const Rect2 = Object.freeze({
  INFINITE,

  create: (left: number, top: number, right: number, bottom: number): Rect2 => ({
    left,
    top,
    right,
    bottom,
  }),

  fromPoints: (p1: Point2, p2: Point2): Rect2 => ({
    left: Math.min(p1.x, p2.x),
    top: Math.min(p1.y, p2.y),
    right: Math.max(p1.x, p2.x),
    bottom: Math.max(p1.y, p2.y),
  }),

  /** Bounds of a point set; empty input yields an inverted (empty) rect. */
  fromPointList: (points: readonly Point2[]): Rect2 => {
    let left = Infinity;
    let top = Infinity;
    let right = -Infinity;
    let bottom = -Infinity;

    for (const p of points) {
      if (p.x < left) left = p.x;
      if (p.y < top) top = p.y;
      if (p.x > right) right = p.x;
      if (p.y > bottom) bottom = p.y;
    }

    return { left, top, right, bottom };
  },

  fromCenterSize: (center: Point2, size: Size2): Rect2 => ({
    left: center.x - size.width / 2,
    top: center.y - size.height / 2,
    right: center.x + size.width / 2,
    bottom: center.y + size.height / 2,
  }),

  fromCenterHalfExtent: (center: Point2, halfExtent: Vec2): Rect2 => ({
    left: center.x - halfExtent.x,
    top: center.y - halfExtent.y,
    right: center.x + halfExtent.x,
    bottom: center.y + halfExtent.y,
  }),

  width: (r: Rect2): number => r.right - r.left,
  height: (r: Rect2): number => r.bottom - r.top,

  size: (r: Rect2): Size2 => ({ width: r.right - r.left, height: r.bottom - r.top }),

  center: (r: Rect2): Point2 => ({
    x: (r.left + r.right) / 2,
    y: (r.top + r.bottom) / 2,
  }),

  /** Vector from the center to the bottom-right corner. */
  halfExtent: (r: Rect2): Vec2 => ({
    x: (r.right - r.left) / 2,
    y: (r.bottom - r.top) / 2,
  }),

  corner: (r: Rect2, corner: RectCorner): Point2 => {
    switch (corner) {
      case "topLeft":
        return { x: r.left, y: r.top };
      case "topRight":
        return { x: r.right, y: r.top };
      case "bottomLeft":
        return { x: r.left, y: r.bottom };
      case "bottomRight":
        return { x: r.right, y: r.bottom };
    }
  },

  /** Clockwise on a Y-down surface, starting at the top-left. */
  corners: (r: Rect2): [Point2, Point2, Point2, Point2] => [
    { x: r.left, y: r.top },
    { x: r.right, y: r.top },
    { x: r.right, y: r.bottom },
    { x: r.left, y: r.bottom },
  ],

  containsPoint: (r: Rect2, p: Point2): boolean =>
    p.x >= r.left && p.y >= r.top && p.x <= r.right && p.y <= r.bottom,

  /** Touching edges count as intersecting. */
  intersects: (a: Rect2, b: Rect2): boolean =>
    a.left <= b.right && a.right >= b.left && a.top <= b.bottom && a.bottom >= b.top,

  normalized,

  translatedBy: (r: Rect2, v: Vec2): Rect2 => ({
    left: r.left + v.x,
    top: r.top + v.y,
    right: r.right + v.x,
    bottom: r.bottom + v.y,
  }),

  expandedBy: (r: Rect2, thickness: Thickness): Rect2 => {
    const t = sides(thickness);
    return {
      left: r.left - t.left,
      top: r.top - t.top,
      right: r.right + t.right,
      bottom: r.bottom + t.bottom,
    };
  },

  shrunkenBy: (r: Rect2, thickness: Thickness): Rect2 => {
    const t = sides(thickness);
    return {
      left: r.left + t.left,
      top: r.top + t.top,
      right: r.right - t.right,
      bottom: r.bottom - t.bottom,
    };
  },

  /** Smallest rect holding both; both inputs are normalized first. */
  combinedWith: (a: Rect2, b: Rect2): Rect2 => {
    const r1 = normalized(a);
    const r2 = normalized(b);
    return {
      left: Math.min(r1.left, r2.left),
      top: Math.min(r1.top, r2.top),
      right: Math.max(r1.right, r2.right),
      bottom: Math.max(r1.bottom, r2.bottom),
    };
  },

  rounded: (r: Rect2): Rect2 => ({
    left: Math.round(r.left),
    top: Math.round(r.top),
    right: Math.round(r.right),
    bottom: Math.round(r.bottom),
  }),

  approxEq: (a: Rect2, b: Rect2, options?: ToleranceOptions): boolean => {
    const epsilon = resolveEpsilon(options, APPROX_EPSILON);
    return (
      Math.abs(a.left - b.left) < epsilon &&
      Math.abs(a.top - b.top) < epsilon &&
      Math.abs(a.right - b.right) < epsilon &&
      Math.abs(a.bottom - b.bottom) < epsilon
    );
  },
});
