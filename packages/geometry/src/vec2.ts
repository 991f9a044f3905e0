import { APPROX_EPSILON, resolveEpsilon, type ToleranceOptions } from "./scalar.js";
import type { Point2 } from "./point2.js";
import type { Size2 } from "./size2.js";

/**
 * A displacement. Affine transforms apply only their linear part to it.
 */
export interface Vec2 {
  x: number;
  y: number;
}

const ZERO: Readonly<Vec2> = Object.freeze({ x: 0, y: 0 });
const ONE: Readonly<Vec2> = Object.freeze({ x: 1, y: 1 });
// Y grows downwards, as on a canvas
const UP: Readonly<Vec2> = Object.freeze({ x: 0, y: -1 });
const RIGHT: Readonly<Vec2> = Object.freeze({ x: 1, y: 0 });
const DOWN: Readonly<Vec2> = Object.freeze({ x: 0, y: 1 });
const LEFT: Readonly<Vec2> = Object.freeze({ x: -1, y: 0 });

export const Vec2 = Object.freeze({
  ZERO,
  ONE,
  UP,
  RIGHT,
  DOWN,
  LEFT,

  create: (x: number = 0, y: number = 0): Vec2 => ({ x, y }),

  add: (a: Vec2, b: Vec2): Vec2 => ({ x: a.x + b.x, y: a.y + b.y }),

  sub: (a: Vec2, b: Vec2): Vec2 => ({ x: a.x - b.x, y: a.y - b.y }),

  mul: (v: Vec2, s: number): Vec2 => ({ x: v.x * s, y: v.y * s }),

  div: (v: Vec2, s: number): Vec2 => ({ x: v.x / s, y: v.y / s }),

  neg: (v: Vec2): Vec2 => ({ x: -v.x, y: -v.y }),

  dot: (a: Vec2, b: Vec2): number => a.x * b.x + a.y * b.y,

  cross: (a: Vec2, b: Vec2): number => a.x * b.y - a.y * b.x, // 2D Cross Product (Scalar)

  len: (v: Vec2): number => Math.sqrt(v.x * v.x + v.y * v.y),

  lenSq: (v: Vec2): number => v.x * v.x + v.y * v.y,

  normalize: (v: Vec2): Vec2 => {
    const len = Math.sqrt(v.x * v.x + v.y * v.y);
    return len === 0 ? { x: 0, y: 0 } : { x: v.x / len, y: v.y / len };
  },

  abs: (v: Vec2): Vec2 => ({ x: Math.abs(v.x), y: Math.abs(v.y) }),

  rounded: (v: Vec2): Vec2 => ({ x: Math.round(v.x), y: Math.round(v.y) }),

  approxEq: (a: Vec2, b: Vec2, options?: ToleranceOptions): boolean => {
    const epsilon = resolveEpsilon(options, APPROX_EPSILON);
    return Math.abs(a.x - b.x) < epsilon && Math.abs(a.y - b.y) < epsilon;
  },

  toPoint: (v: Vec2): Point2 => ({ x: v.x, y: v.y }),

  toSize: (v: Vec2): Size2 => ({ width: v.x, height: v.y }),
});
