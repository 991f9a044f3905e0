import { Affine2 } from "./affine2.js";
import type { Point2 } from "./point2.js";

export interface Triangle {
  p1: Point2;
  p2: Point2;
  p3: Point2;
}

export const Triangle = Object.freeze({
  create: (p1: Point2, p2: Point2, p3: Point2): Triangle => ({ p1, p2, p3 }),

  /** Positive when p1, p2, p3 turn from +x towards +y. */
  signedArea: (t: Triangle): number =>
    ((t.p2.x - t.p1.x) * (t.p3.y - t.p1.y) - (t.p3.x - t.p1.x) * (t.p2.y - t.p1.y)) / 2,

  transformed: (t: Triangle, m: Affine2): Triangle => ({
    p1: Affine2.transformPoint(m, t.p1),
    p2: Affine2.transformPoint(m, t.p2),
    p3: Affine2.transformPoint(m, t.p3),
  }),
});
