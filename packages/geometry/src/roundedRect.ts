import { Affine2 } from "./affine2.js";
import { Ellipse } from "./ellipse.js";
import type { Point2 } from "./point2.js";
import { Rect2, type RectCorner } from "./rect2.js";

/**
 * Rectangle whose corners are cut by the quarter ellipses that touch its
 * inner edges.
 */
export interface RoundedRect {
  rect: Rect2;
  radiusX: number;
  radiusY: number;
}

function cornerEllipse(r: RoundedRect, corner: RectCorner): Ellipse {
  const p = Rect2.corner(r.rect, corner);
  const dx = corner === "topLeft" || corner === "bottomLeft" ? r.radiusX : -r.radiusX;
  const dy = corner === "topLeft" || corner === "topRight" ? r.radiusY : -r.radiusY;
  return Ellipse.create({ x: p.x + dx, y: p.y + dy }, r.radiusX, r.radiusY);
}

function containsPoint(r: RoundedRect, p: Point2): boolean {
  if (!Rect2.containsPoint(r.rect, p)) {
    return false;
  }

  // fold the point into the bottom-right quadrant; the shape is symmetric
  const c = Rect2.center(r.rect);
  const folded = { x: c.x + Math.abs(p.x - c.x), y: c.y + Math.abs(p.y - c.y) };
  const corner = cornerEllipse(r, "bottomRight");

  if (folded.x <= corner.center.x || folded.y <= corner.center.y) {
    return true;
  }
  return Ellipse.containsPoint(corner, folded);
}

export const RoundedRect = Object.freeze({
  create: (rect: Rect2, radiusX: number, radiusY: number = radiusX): RoundedRect => ({
    rect: { left: rect.left, top: rect.top, right: rect.right, bottom: rect.bottom },
    radiusX,
    radiusY,
  }),

  cornerEllipse,

  /** Excludes the parts of the corners outside the rounding. */
  containsPoint,

  /** Bounding-rect test only; ignores the rounding. */
  containsPointCrude: (r: RoundedRect, p: Point2): boolean => Rect2.containsPoint(r.rect, p),

  /** Same as {@link containsPoint} for the shape drawn under `transform`. */
  containsPointTransformed: (r: RoundedRect, transform: Affine2, p: Point2): boolean => {
    const inverse = Affine2.tryInverse(transform);
    return inverse !== undefined && containsPoint(r, Affine2.transformPoint(inverse, p));
  },
});
