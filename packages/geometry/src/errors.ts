export type GeometryErrorCode =
  | "ERR_DEGENERATE_TRANSFORM"
  | "ERR_AMBIGUOUS_DECOMPOSITION"
  | "ERR_INVALID_COEFFICIENTS";

export class GeometryError extends Error {
  public readonly code: GeometryErrorCode;

  constructor(code: GeometryErrorCode, message: string) {
    super(message);
    this.name = "GeometryError";
    this.code = code;
  }
}

/**
 * The linear part collapses area to a line or a point, so no inverse exists.
 */
export class DegenerateTransformError extends GeometryError {
  public readonly determinant: number;

  constructor(determinant: number) {
    super("ERR_DEGENERATE_TRANSFORM", `Transform is not invertible (determinant ${determinant})`);
    this.name = "DegenerateTransformError";
    this.determinant = determinant;
  }
}

/**
 * The transform contains a reflection, so its scale signs have no unique placement.
 */
export class AmbiguousDecompositionError extends GeometryError {
  public readonly determinant: number;

  constructor(determinant: number) {
    super(
      "ERR_AMBIGUOUS_DECOMPOSITION",
      `Transform contains a reflection and has no unique decomposition (determinant ${determinant})`
    );
    this.name = "AmbiguousDecompositionError";
    this.determinant = determinant;
  }
}

export class InvalidCoefficientsError extends GeometryError {
  constructor(message: string) {
    super("ERR_INVALID_COEFFICIENTS", message);
    this.name = "InvalidCoefficientsError";
  }
}
