import { Affine2 } from "./affine2.js";
import type { Point2 } from "./point2.js";
import type { Size2 } from "./size2.js";

// Path segments. The start point of each one is the end of the previous
// segment in the path, so only the remaining points are stored.

/** Cubic Bezier: two control points, then the end point. */
export type BezierSegment = { p1: Point2; p2: Point2; p3: Point2 };

/** Quadratic Bezier: the control point, then the end point. */
export type QuadBezierSegment = { p1: Point2; p2: Point2 };

export type SweepDirection = "counterClockwise" | "clockwise";

/** Whether the arc spans at most or at least 180 degrees. */
export type ArcSize = "small" | "large";

/** Elliptical arc ending at `point`, as in SVG and Direct2D paths. */
export type ArcSegment = {
  point: Point2;
  /** The x and y radius. */
  size: Size2;
  /** Degrees the ellipse is turned clockwise, as SVG's `x-axis-rotation`. */
  rotationAngle: number;
  sweepDirection: SweepDirection;
  arcSize: ArcSize;
};

export const BezierSegment = Object.freeze({
  create: (p1: Point2, p2: Point2, p3: Point2): BezierSegment => ({ p1, p2, p3 }),

  /** Affine maps carry Bezier curves onto the curve of the mapped points. */
  transformed: (s: BezierSegment, m: Affine2): BezierSegment => ({
    p1: Affine2.transformPoint(m, s.p1),
    p2: Affine2.transformPoint(m, s.p2),
    p3: Affine2.transformPoint(m, s.p3),
  }),
});

export const QuadBezierSegment = Object.freeze({
  create: (p1: Point2, p2: Point2): QuadBezierSegment => ({ p1, p2 }),

  transformed: (s: QuadBezierSegment, m: Affine2): QuadBezierSegment => ({
    p1: Affine2.transformPoint(m, s.p1),
    p2: Affine2.transformPoint(m, s.p2),
  }),
});

export const ArcSegment = Object.freeze({
  create: (
    point: Point2,
    size: Size2,
    rotationAngle: number = 0,
    sweepDirection: SweepDirection = "counterClockwise",
    arcSize: ArcSize = "small"
  ): ArcSegment => ({ point, size, rotationAngle, sweepDirection, arcSize }),
});
