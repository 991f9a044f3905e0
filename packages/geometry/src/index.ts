export { Vec2 } from "./vec2.js";
export { Point2 } from "./point2.js";
export { Size2 } from "./size2.js";
export { Rect2 } from "./rect2.js";
export type { RectCorner, Thickness } from "./rect2.js";
export { Ellipse } from "./ellipse.js";
export { RoundedRect } from "./roundedRect.js";
export { Triangle } from "./triangle.js";
export { ArcSegment, BezierSegment, QuadBezierSegment } from "./segments.js";
export type { ArcSize, SweepDirection } from "./segments.js";

export { Affine2 } from "./affine2.js";
export type { Affine2Array, Affine2Rows, AffineParts, Decomposition } from "./affine2.js";

export {
  fromCanvasMatrix,
  fromMat3,
  parseCssMatrix,
  toCanvasMatrix,
  toCssMatrix,
  toMat3,
} from "./interop.js";
export type { CanvasMatrix, Mat3 } from "./interop.js";

export {
  AmbiguousDecompositionError,
  DegenerateTransformError,
  GeometryError,
  InvalidCoefficientsError,
} from "./errors.js";
export type { GeometryErrorCode } from "./errors.js";

export {
  APPROX_EPSILON,
  DETERMINANT_EPSILON,
  clamp,
  degreesToRadians,
  nearlyEqual,
  normalizeAngle,
  radiansToDegrees,
  resolveEpsilon,
} from "./scalar.js";
export type { ToleranceOptions } from "./scalar.js";
