import { APPROX_EPSILON, resolveEpsilon, type ToleranceOptions } from "./scalar.js";
import type { Vec2 } from "./vec2.js";

/**
 * A location. Affine transforms apply their translation to it.
 */
export interface Point2 {
  x: number;
  y: number;
}

const ORIGIN: Readonly<Point2> = Object.freeze({ x: 0, y: 0 });

export const Point2 = Object.freeze({
  ORIGIN,

  create: (x: number = 0, y: number = 0): Point2 => ({ x, y }),

  /** Moves a point by a displacement. */
  add: (p: Point2, v: Vec2): Point2 => ({ x: p.x + v.x, y: p.y + v.y }),

  /** Displacement from `b` to `a`. */
  sub: (a: Point2, b: Point2): Vec2 => ({ x: a.x - b.x, y: a.y - b.y }),

  offset: (p: Point2, v: Vec2): Point2 => ({ x: p.x - v.x, y: p.y - v.y }),

  midpoint: (a: Point2, b: Point2): Point2 => ({ x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 }),

  /** t=0 returns a, t=1 returns b */
  lerp: (a: Point2, b: Point2, t: number): Point2 => ({
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
  }),

  distance: (a: Point2, b: Point2): number => Math.hypot(a.x - b.x, a.y - b.y),

  rounded: (p: Point2): Point2 => ({ x: Math.round(p.x), y: Math.round(p.y) }),

  approxEq: (a: Point2, b: Point2, options?: ToleranceOptions): boolean => {
    const epsilon = resolveEpsilon(options, APPROX_EPSILON);
    return Math.abs(a.x - b.x) < epsilon && Math.abs(a.y - b.y) < epsilon;
  },

  toVector: (p: Point2): Vec2 => ({ x: p.x, y: p.y }),
});
