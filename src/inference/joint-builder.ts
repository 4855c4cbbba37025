import type { Axis, GridFunction } from "../types/grid-types";
import { InvalidDensityValueError } from "./errors";
import { JointGrid } from "./grid";

/**
 * Outer evaluation: cell(i, j) = f(axisX[i], axisY[j]).
 *
 * `f` is evaluated at every pair; nothing assumes it factors into a product of
 * one-dimensional terms. Negative or non-finite values are rejected so they
 * never reach a normalization.
 */
export function buildJoint(axisX: Axis, axisY: Axis, f: GridFunction): JointGrid {
  return JointGrid.generate(axisX.length, axisY.length, (i, j) => {
    const x = axisX[i];
    const y = axisY[j];
    const value = f(x, y);
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidDensityValueError(x, y, value);
    }
    return value;
  });
}

/**
 * cell(i, j) = columnValues[i] for every j. Used when the function only depends
 * on the row parameter, so it is evaluated once per row instead of once per cell.
 */
export function broadcastColumns(columnValues: readonly number[], cols: number): JointGrid {
  return JointGrid.generate(columnValues.length, cols, (i) => columnValues[i]);
}
