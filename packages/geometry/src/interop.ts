import { Affine2 } from "./affine2.js";
import { InvalidCoefficientsError } from "./errors.js";
import { APPROX_EPSILON } from "./scalar.js";

/**
 * The `{ a, b, c, d, e, f }` form used by `CanvasRenderingContext2D.setTransform`,
 * `DOMMatrix` and SVG, where `x' = a*x + c*y + e` and `y' = b*x + d*y + f`.
 * The letters map 1:1 onto m11, m12, m21, m22, m31, m32.
 */
export type CanvasMatrix = {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
};

/**
 * Column-major 3x3 matrix as uploaded to a WebGL `mat3` uniform.
 */
export type Mat3 = [number, number, number, number, number, number, number, number, number];

export function toCanvasMatrix(m: Affine2): CanvasMatrix {
  return { a: m.m11, b: m.m12, c: m.m21, d: m.m22, e: m.m31, f: m.m32 };
}

export function fromCanvasMatrix({ a, b, c, d, e, f }: CanvasMatrix): Affine2 {
  return Affine2.create(a, b, c, d, e, f);
}

export function toMat3(m: Affine2): Mat3 {
  return [
    m.m11, m.m12, 0, // column 0
    m.m21, m.m22, 0, // column 1
    m.m31, m.m32, 1, // column 2
  ];
}

/**
 * Reads a column-major `mat3`. The bottom row must be (0, 0, 1); a projective
 * matrix has no affine equivalent and throws {@link InvalidCoefficientsError}.
 */
export function fromMat3(values: ArrayLike<number>): Affine2 {
  if (values.length !== 9) {
    throw new InvalidCoefficientsError(`Expected 9 matrix entries, got ${values.length}`);
  }
  if (
    !(Math.abs(values[2]) < APPROX_EPSILON) ||
    !(Math.abs(values[5]) < APPROX_EPSILON) ||
    !(Math.abs(values[8] - 1) < APPROX_EPSILON)
  ) {
    throw new InvalidCoefficientsError("Matrix is not affine: bottom row must be (0, 0, 1)");
  }
  return Affine2.create(values[0], values[1], values[3], values[4], values[6], values[7]);
}

/** CSS `transform` function syntax. */
export function toCssMatrix(m: Affine2): string {
  return `matrix(${m.m11}, ${m.m12}, ${m.m21}, ${m.m22}, ${m.m31}, ${m.m32})`;
}

const CSS_MATRIX = /^\s*matrix\(([^)]*)\)\s*$/i;

/**
 * Parses `matrix(a, b, c, d, e, f)` or `none`, as returned by
 * `getComputedStyle(el).transform`.
 */
export function parseCssMatrix(text: string): Affine2 {
  if (text.trim().toLowerCase() === "none") {
    return Affine2.identity();
  }

  const match = CSS_MATRIX.exec(text);
  if (!match) {
    throw new InvalidCoefficientsError(`Not a CSS matrix(): ${text}`);
  }

  // Number("") is 0, so an empty argument has to be caught before converting
  const parts = match[1].trim().split(/\s*,\s*|\s+/);
  const numbers = parts.map(Number);
  if (
    parts.length !== 6 ||
    parts.some((part) => part.length === 0) ||
    numbers.some((n) => !Number.isFinite(n))
  ) {
    throw new InvalidCoefficientsError(`CSS matrix() needs 6 finite numbers: ${text}`);
  }
  return Affine2.fromArray(numbers);
}
