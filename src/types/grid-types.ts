/** Ordered cell-center values along one parameter axis. */
export type Axis = readonly number[];

/** One-dimensional distribution over an axis, one entry per axis value. */
export type Marginal = readonly number[];

/** Which parameter a marginal is taken over. theta indexes rows, mu indexes columns. */
export type ParameterAxis = "theta" | "mu";

/**
 * Read-only view of a joint grid, indexed (thetaIndex, muIndex).
 * Used by code that reduces or reads a grid without producing a new one.
 */
export interface IJointGrid {
  readonly rows: number;
  readonly cols: number;
  get(i: number, j: number): number;
}

/** A grid or vector rescaled to sum to 1, with the sum it had before. */
export interface Normalized<T> {
  normalized: T;
  mass: number;
}

/** Bivariate function evaluated at every (axisX[i], axisY[j]) pair. */
export type GridFunction = (x: number, y: number) => number;
