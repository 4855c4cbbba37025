export type InferenceErrorCode =
  | "INVALID_GRID_RESOLUTION"
  | "INVALID_SHAPE_PARAMETERS"
  | "INVALID_DENSITY_VALUE"
  | "DEGENERATE_NORMALIZATION"
  | "SHAPE_MISMATCH"
  | "INVALID_MODEL_PARAMS";

/**
 * Base class for every failure raised by the grid computation.
 * None of these are retryable: each one points at a caller configuration problem.
 */
export class InferenceError extends Error {
  constructor(
    message: string,
    public readonly code: InferenceErrorCode,
  ) {
    super(message);
    this.name = "InferenceError";
  }
}

export class InvalidGridResolutionError extends InferenceError {
  constructor(public readonly resolution: number) {
    super(`Grid resolution must be an integer >= 1, got ${resolution}`, "INVALID_GRID_RESOLUTION");
    this.name = "InvalidGridResolutionError";
  }
}

export class InvalidShapeParametersError extends InferenceError {
  constructor(
    public readonly shapeA: number,
    public readonly shapeB: number,
  ) {
    super(
      `Beta shape parameters must be finite and non-negative, got a=${shapeA}, b=${shapeB}`,
      "INVALID_SHAPE_PARAMETERS",
    );
    this.name = "InvalidShapeParametersError";
  }
}

/** A bivariate function handed to the joint builder returned a negative or non-finite value. */
export class InvalidDensityValueError extends InferenceError {
  constructor(
    public readonly x: number,
    public readonly y: number,
    public readonly value: number,
  ) {
    super(`Grid function returned ${value} at (${x}, ${y})`, "INVALID_DENSITY_VALUE");
    this.name = "InvalidDensityValueError";
  }
}

/**
 * The mass to divide by is zero or not finite. Usually every cell underflowed,
 * e.g. large observation counts on a coarse grid.
 */
export class DegenerateNormalizationError extends InferenceError {
  constructor(public readonly mass: number) {
    super(`Cannot normalize: total mass is ${mass}`, "DEGENERATE_NORMALIZATION");
    this.name = "DegenerateNormalizationError";
  }
}

export class ShapeMismatchError extends InferenceError {
  constructor(
    public readonly left: readonly [number, number],
    public readonly right: readonly [number, number],
  ) {
    super(
      `Grid shapes differ: ${left[0]}x${left[1]} vs ${right[0]}x${right[1]}`,
      "SHAPE_MISMATCH",
    );
    this.name = "ShapeMismatchError";
  }
}

export class InvalidModelParamsError extends InferenceError {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid model parameters: ${issues.join("; ")}`, "INVALID_MODEL_PARAMS");
    this.name = "InvalidModelParamsError";
  }
}

export function formatError(err: unknown): string {
  if (err instanceof InferenceError) {
    return `[${err.code}] ${err.message}`;
  }
  if (err instanceof Error) {
    return err.stack ?? err.message;
  }
  if (typeof err === "string") {
    return err;
  }
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
