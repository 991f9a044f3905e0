import { Affine2 } from "./affine2.js";
import type { Point2 } from "./point2.js";

/**
 * Axis-aligned ellipse given by its center and the two radii.
 */
export interface Ellipse {
  center: Point2;
  radiusX: number;
  radiusY: number;
}

function containsPoint(e: Ellipse, p: Point2): boolean {
  const dx = p.x - e.center.x;
  const dy = p.y - e.center.y;
  return (dx * dx) / (e.radiusX * e.radiusX) + (dy * dy) / (e.radiusY * e.radiusY) <= 1;
}

export const Ellipse = Object.freeze({
  create: (center: Point2, radiusX: number, radiusY: number = radiusX): Ellipse => ({
    center: { x: center.x, y: center.y },
    radiusX,
    radiusY,
  }),

  /** Boundary points count as inside. A zero radius contains nothing. */
  containsPoint,

  /**
   * Hit test against the ellipse drawn under `transform`; `p` is in the
   * transformed space. A transform without an inverse contains nothing.
   */
  containsPointTransformed: (e: Ellipse, transform: Affine2, p: Point2): boolean => {
    const inverse = Affine2.tryInverse(transform);
    if (inverse === undefined) {
      return false;
    }
    return containsPoint(e, Affine2.transformPoint(inverse, p));
  },
});
