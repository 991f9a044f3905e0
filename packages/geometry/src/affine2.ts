import { AmbiguousDecompositionError, DegenerateTransformError, InvalidCoefficientsError } from "./errors.js";
import { Point2 } from "./point2.js";
import { Rect2 } from "./rect2.js";
import {
  APPROX_EPSILON,
  DETERMINANT_EPSILON,
  normalizeAngle,
  resolveEpsilon,
  type ToleranceOptions,
} from "./scalar.js";
import type { Vec2 } from "./vec2.js";

/**
 * 2D affine transform stored as the first two columns of a 3x3 matrix that
 * multiplies row vectors from the right:
 *
 * ```
 *            [ m11 m12 0 ]
 * [x y 1] *  [ m21 m22 0 ]  =  [x' y' 1]
 *            [ m31 m32 1 ]
 * ```
 *
 * so `x' = x*m11 + y*m21 + m31` and `y' = x*m12 + y*m22 + m32`.
 *
 * Because points sit on the left, the transform applied first is the left
 * operand of {@link multiply}. Prefer {@link then} / {@link after}, whose names
 * carry the order.
 */
export interface Affine2 {
  readonly m11: number;
  readonly m12: number;
  readonly m21: number;
  readonly m22: number;
  readonly m31: number;
  readonly m32: number;
}

/** Coefficients in serialization order: m11, m12, m21, m22, m31, m32. */
export type Affine2Array = [number, number, number, number, number, number];

export type Affine2Rows = [[number, number], [number, number], [number, number]];

/**
 * Factors of a transform without reflection, applied in this order: scale,
 * skew along x, rotation, translation.
 */
export type AffineParts = {
  translation: Vec2;
  /** Radians in (-PI, PI]. */
  rotation: number;
  /** Both components are positive for a decomposed transform. */
  scale: Vec2;
  /** Angle in radians; x' = x + y * tan(skew) before rotation. */
  skew: number;
};

export type Decomposition =
  | ({ kind: "decomposed" } & AffineParts)
  | { kind: "degenerate"; determinant: number }
  | { kind: "reflected"; determinant: number };

const IDENTITY: Affine2 = Object.freeze({ m11: 1, m12: 0, m21: 0, m22: 1, m31: 0, m32: 0 });

function create(m11: number, m12: number, m21: number, m22: number, m31: number, m32: number): Affine2 {
  return { m11, m12, m21, m22, m31, m32 };
}

function identity(): Affine2 {
  return IDENTITY;
}

function translation(dx: number, dy: number): Affine2;
function translation(offset: Vec2): Affine2;
function translation(dxOrOffset: number | Vec2, dy: number = 0): Affine2 {
  if (typeof dxOrOffset === "number") {
    return { m11: 1, m12: 0, m21: 0, m22: 1, m31: dxOrOffset, m32: dy };
  }
  return { m11: 1, m12: 0, m21: 0, m22: 1, m31: dxOrOffset.x, m32: dxOrOffset.y };
}

/**
 * Scales about `center`, which stays fixed. Equivalent to
 * `chain(translation(-c), scaling(sx, sy), translation(c))`.
 */
function scaling(s: number, center?: Point2): Affine2;
function scaling(sx: number, sy: number, center?: Point2): Affine2;
function scaling(sx: number, syOrCenter?: number | Point2, maybeCenter?: Point2): Affine2 {
  const sy = typeof syOrCenter === "number" ? syOrCenter : sx;
  const center = (typeof syOrCenter === "number" ? maybeCenter : syOrCenter) ?? Point2.ORIGIN;
  return {
    m11: sx,
    m12: 0,
    m21: 0,
    m22: sy,
    m31: center.x - sx * center.x,
    m32: center.y - sy * center.y,
  };
}

/**
 * Rotates by `angle` radians about `center`.
 *
 * A positive angle turns the +x axis towards +y: `rotation(Math.PI / 2)` maps
 * (1, 0) to (0, 1). That is counter-clockwise when y points up and clockwise
 * on screen when y points down (canvas, SVG, Direct2D).
 */
function rotation(angle: number, center: Point2 = Point2.ORIGIN): Affine2 {
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return {
    m11: cos,
    m12: sin,
    m21: -sin,
    m22: cos,
    m31: center.x - cos * center.x + sin * center.y,
    m32: center.y - sin * center.x - cos * center.y,
  };
}

/**
 * Shears about `center`: `x' = x + y*tan(angleX)`, `y' = y + x*tan(angleY)`
 * relative to the center.
 */
function skew(angleX: number, angleY: number, center: Point2 = Point2.ORIGIN): Affine2 {
  const tanX = Math.tan(angleX);
  const tanY = Math.tan(angleY);
  return {
    m11: 1,
    m12: tanY,
    m21: tanX,
    m22: 1,
    m31: -center.y * tanX,
    m32: -center.x * tanY,
  };
}

/**
 * Row-vector product `lhs * rhs`: the result applies `lhs` first.
 */
function multiply(lhs: Affine2, rhs: Affine2): Affine2 {
  return {
    m11: lhs.m11 * rhs.m11 + lhs.m12 * rhs.m21,
    m12: lhs.m11 * rhs.m12 + lhs.m12 * rhs.m22,
    m21: lhs.m21 * rhs.m11 + lhs.m22 * rhs.m21,
    m22: lhs.m21 * rhs.m12 + lhs.m22 * rhs.m22,
    m31: lhs.m31 * rhs.m11 + lhs.m32 * rhs.m21 + rhs.m31,
    m32: lhs.m31 * rhs.m12 + lhs.m32 * rhs.m22 + rhs.m32,
  };
}

/** Applies `first`, then `second`. */
function then(first: Affine2, second: Affine2): Affine2 {
  return multiply(first, second);
}

/** Applies `first`, then `second`; reads as `second ∘ first`. */
function after(second: Affine2, first: Affine2): Affine2 {
  return multiply(first, second);
}

/** Applies the transforms in the order given. */
function chain(...transforms: Affine2[]): Affine2 {
  let result = IDENTITY;
  for (const m of transforms) {
    result = multiply(result, m);
  }
  return result;
}

function transformPoint(m: Affine2, p: Point2): Point2 {
  return {
    x: p.x * m.m11 + p.y * m.m21 + m.m31,
    y: p.x * m.m12 + p.y * m.m22 + m.m32,
  };
}

/** Linear part only; translation never moves a vector. */
function transformVector(m: Affine2, v: Vec2): Vec2 {
  return {
    x: v.x * m.m11 + v.y * m.m21,
    y: v.x * m.m12 + v.y * m.m22,
  };
}

/** Axis-aligned bounds of the transformed corners. */
function transformRect(m: Affine2, r: Rect2): Rect2 {
  return Rect2.fromPointList(Rect2.corners(r).map((p) => transformPoint(m, p)));
}

function translationOf(m: Affine2): Vec2 {
  return { x: m.m31, y: m.m32 };
}

function determinant(m: Affine2): number {
  return m.m11 * m.m22 - m.m12 * m.m21;
}

/**
 * The determinant is `value * scale * scale`. When the plain product
 * overflows but the linear part is finite, the linear part is divided by its
 * largest magnitude first so `value` stays finite.
 */
type ScaledDeterminant = { value: number; scale: number };

function scaledDeterminant(m: Affine2): ScaledDeterminant {
  const det = determinant(m);
  if (
    Number.isFinite(det) ||
    !(Number.isFinite(m.m11) && Number.isFinite(m.m12) && Number.isFinite(m.m21) && Number.isFinite(m.m22))
  ) {
    return { value: det, scale: 1 };
  }
  const k = Math.max(Math.abs(m.m11), Math.abs(m.m12), Math.abs(m.m21), Math.abs(m.m22));
  return { value: (m.m11 / k) * (m.m22 / k) - (m.m12 / k) * (m.m21 / k), scale: k };
}

function fullDeterminant(det: ScaledDeterminant): number {
  return det.value * det.scale * det.scale;
}

function isSingular(det: ScaledDeterminant, epsilon: number): boolean {
  // scale * scale may overflow to Infinity; the threshold then drops to 0
  return !Number.isFinite(det.value) || Math.abs(det.value) <= epsilon / (det.scale * det.scale);
}

function isInvertible(m: Affine2, options?: ToleranceOptions): boolean {
  return !isSingular(scaledDeterminant(m), resolveEpsilon(options, DETERMINANT_EPSILON));
}

function isFiniteTransform(m: Affine2): boolean {
  return (
    Number.isFinite(m.m11) &&
    Number.isFinite(m.m12) &&
    Number.isFinite(m.m21) &&
    Number.isFinite(m.m22) &&
    Number.isFinite(m.m31) &&
    Number.isFinite(m.m32)
  );
}

function approxEq(a: Affine2, b: Affine2, options?: ToleranceOptions): boolean {
  const epsilon = resolveEpsilon(options, APPROX_EPSILON);
  return (
    Math.abs(a.m11 - b.m11) < epsilon &&
    Math.abs(a.m12 - b.m12) < epsilon &&
    Math.abs(a.m21 - b.m21) < epsilon &&
    Math.abs(a.m22 - b.m22) < epsilon &&
    Math.abs(a.m31 - b.m31) < epsilon &&
    Math.abs(a.m32 - b.m32) < epsilon
  );
}

function equals(a: Affine2, b: Affine2): boolean {
  return (
    a.m11 === b.m11 &&
    a.m12 === b.m12 &&
    a.m21 === b.m21 &&
    a.m22 === b.m22 &&
    a.m31 === b.m31 &&
    a.m32 === b.m32
  );
}

function isIdentity(m: Affine2, options?: ToleranceOptions): boolean {
  return approxEq(m, IDENTITY, options);
}

function invertWith(m: Affine2, det: ScaledDeterminant): Affine2 {
  const k = det.scale;
  const m11 = m.m22 / k / det.value / k;
  const m12 = -m.m12 / k / det.value / k;
  const m21 = -m.m21 / k / det.value / k;
  const m22 = m.m11 / k / det.value / k;
  return {
    m11,
    m12,
    m21,
    m22,
    m31: -(m.m31 * m11 + m.m32 * m21),
    m32: -(m.m31 * m12 + m.m32 * m22),
  };
}

/**
 * Throws {@link DegenerateTransformError} when the determinant is not finite
 * or its magnitude is at most the epsilon (default {@link DETERMINANT_EPSILON}).
 */
function inverse(m: Affine2, options?: ToleranceOptions): Affine2 {
  const det = scaledDeterminant(m);
  if (isSingular(det, resolveEpsilon(options, DETERMINANT_EPSILON))) {
    throw new DegenerateTransformError(fullDeterminant(det));
  }
  return invertWith(m, det);
}

function tryInverse(m: Affine2, options?: ToleranceOptions): Affine2 | undefined {
  const det = scaledDeterminant(m);
  if (isSingular(det, resolveEpsilon(options, DETERMINANT_EPSILON))) {
    return undefined;
  }
  return invertWith(m, det);
}

/**
 * Builds `chain(scaling, skew(x), rotation, translation)` from its parts.
 * Missing parts default to the identity.
 */
function fromParts(parts: Partial<AffineParts>): Affine2 {
  const scale = parts.scale ?? { x: 1, y: 1 };
  const offset = parts.translation ?? { x: 0, y: 0 };
  return chain(
    scaling(scale.x, scale.y),
    skew(parts.skew ?? 0, 0),
    rotation(parts.rotation ?? 0),
    translation(offset.x, offset.y)
  );
}

/**
 * Splits a transform into the parts {@link fromParts} rebuilds it from.
 *
 * The first row is the image of the x axis, so it fixes the x scale and the
 * rotation. What remains of the second row after undoing the rotation gives
 * the y scale (`det / sx`) and the x skew. A negative determinant means a
 * reflection, which could be placed in either scale or folded into the
 * rotation; that case is reported as `reflected` instead of picking one.
 */
function decompose(m: Affine2, options?: ToleranceOptions): Decomposition {
  const det = scaledDeterminant(m);
  if (isSingular(det, resolveEpsilon(options, DETERMINANT_EPSILON))) {
    return { kind: "degenerate", determinant: fullDeterminant(det) };
  }
  if (det.value < 0) {
    return { kind: "reflected", determinant: fullDeterminant(det) };
  }

  const sx = Math.hypot(m.m11, m.m12);
  const cos = m.m11 / sx;
  const sin = m.m12 / sx;
  const sy = ((det.value * det.scale) / sx) * det.scale;
  const shear = (m.m21 * cos + m.m22 * sin) / sy;

  return {
    kind: "decomposed",
    translation: { x: m.m31, y: m.m32 },
    rotation: normalizeAngle(Math.atan2(m.m12, m.m11)),
    scale: { x: sx, y: sy },
    skew: Math.atan(shear),
  };
}

function decomposeOrThrow(m: Affine2, options?: ToleranceOptions): AffineParts {
  const result = decompose(m, options);
  switch (result.kind) {
    case "degenerate":
      throw new DegenerateTransformError(result.determinant);
    case "reflected":
      throw new AmbiguousDecompositionError(result.determinant);
    case "decomposed":
      return {
        translation: result.translation,
        rotation: result.rotation,
        scale: result.scale,
        skew: result.skew,
      };
  }
}

function toArray(m: Affine2): Affine2Array {
  return [m.m11, m.m12, m.m21, m.m22, m.m31, m.m32];
}

/**
 * Reads six coefficients in {@link toArray} order. Anything else throws
 * {@link InvalidCoefficientsError}.
 */
function fromArray(values: unknown): Affine2 {
  let list: unknown[];
  if (Array.isArray(values)) {
    list = values;
  } else if (values instanceof Float32Array || values instanceof Float64Array) {
    list = Array.from(values);
  } else {
    throw new InvalidCoefficientsError("Expected an array of 6 coefficients");
  }
  if (list.length !== 6) {
    throw new InvalidCoefficientsError(`Expected 6 coefficients, got ${list.length}`);
  }
  const numbers: number[] = [];
  for (const [index, value] of list.entries()) {
    if (typeof value !== "number") {
      throw new InvalidCoefficientsError(`Coefficient ${index} is not a number`);
    }
    numbers.push(value);
  }
  const [m11, m12, m21, m22, m31, m32] = numbers;
  return { m11, m12, m21, m22, m31, m32 };
}

function toRows(m: Affine2): Affine2Rows {
  return [
    [m.m11, m.m12],
    [m.m21, m.m22],
    [m.m31, m.m32],
  ];
}

function fromRows(rows: Affine2Rows): Affine2 {
  return {
    m11: rows[0][0],
    m12: rows[0][1],
    m21: rows[1][0],
    m22: rows[1][1],
    m31: rows[2][0],
    m32: rows[2][1],
  };
}

/** The full 3x3 matrix as rows, in the row-vector form documented above. */
function toRowMajor3x3(m: Affine2): [[number, number, number], [number, number, number], [number, number, number]] {
  return [
    [m.m11, m.m12, 0],
    [m.m21, m.m22, 0],
    [m.m31, m.m32, 1],
  ];
}

/** Transpose of {@link toRowMajor3x3}: the column-vector form. */
function toColumnMajor3x3(m: Affine2): [[number, number, number], [number, number, number], [number, number, number]] {
  return [
    [m.m11, m.m21, m.m31],
    [m.m12, m.m22, m.m32],
    [0, 0, 1],
  ];
}

function format(m: Affine2, digits = 3): string {
  const f = (n: number) => n.toFixed(digits);
  return `[${f(m.m11)}, ${f(m.m12)}; ${f(m.m21)}, ${f(m.m22)}; ${f(m.m31)}, ${f(m.m32)}]`;
}

export const Affine2 = Object.freeze({
  IDENTITY,
  create,
  identity,
  translation,
  scaling,
  rotation,
  skew,
  fromParts,

  multiply,
  then,
  after,
  chain,

  transformPoint,
  transformVector,
  transformRect,
  translationOf,

  determinant,
  isInvertible,
  isIdentity,
  isFinite: isFiniteTransform,
  approxEq,
  equals,

  inverse,
  tryInverse,

  decompose,
  decomposeOrThrow,

  toArray,
  fromArray,
  toRows,
  fromRows,
  toRowMajor3x3,
  toColumnMajor3x3,
  format,
});
