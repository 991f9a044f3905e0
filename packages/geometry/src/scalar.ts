/**
 * Determinants with an absolute value at or below this are treated as singular.
 */
export const DETERMINANT_EPSILON = 1e-12;

/**
 * Default tolerance for approximate component-wise comparisons.
 */
export const APPROX_EPSILON = 1e-6;

export type ToleranceOptions = {
  epsilon?: number;
};

export function resolveEpsilon(options: ToleranceOptions | undefined, fallback: number): number {
  const epsilon = options?.epsilon ?? fallback;
  if (Number.isNaN(epsilon) || epsilon < 0) {
    throw new RangeError(`epsilon must be a non-negative number, got ${epsilon}`);
  }
  return epsilon;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function nearlyEqual(a: number, b: number, epsilon = APPROX_EPSILON): boolean {
  return Math.abs(a - b) < epsilon;
}

/**
 * Wraps an angle into (-PI, PI].
 */
export function normalizeAngle(angle: number): number {
  const turn = 2 * Math.PI;
  let wrapped = angle % turn;
  if (wrapped <= -Math.PI) wrapped += turn;
  if (wrapped > Math.PI) wrapped -= turn;
  return wrapped;
}

export function degreesToRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

export function radiansToDegrees(radians: number): number {
  return radians * (180 / Math.PI);
}
