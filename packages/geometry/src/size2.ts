import { APPROX_EPSILON, resolveEpsilon, type ToleranceOptions } from "./scalar.js";
import type { Vec2 } from "./vec2.js";

export interface Size2 {
  width: number;
  height: number;
}

export const Size2 = Object.freeze({
  create: (width: number = 0, height: number = 0): Size2 => ({ width, height }),

  area: (s: Size2): number => s.width * s.height,

  isEmpty: (s: Size2): boolean => !(s.width > 0 && s.height > 0),

  scale: (s: Size2, factor: number): Size2 => ({ width: s.width * factor, height: s.height * factor }),

  toVector: (s: Size2): Vec2 => ({ x: s.width, y: s.height }),

  approxEq: (a: Size2, b: Size2, options?: ToleranceOptions): boolean => {
    const epsilon = resolveEpsilon(options, APPROX_EPSILON);
    return Math.abs(a.width - b.width) < epsilon && Math.abs(a.height - b.height) < epsilon;
  },
});
