import type { Axis, IJointGrid, Marginal, ParameterAxis } from "../types/grid-types";
import { argMax } from "../utils/grid-utils";
import { normalizeVector } from "./normalize";

/**
 * Unnormalized reduction of a joint grid onto one parameter.
 *
 * theta: result[i] = Σ_j grid(i, j)
 * mu:    result[j] = Σ_i grid(i, j)
 */
export function sumOut(grid: IJointGrid, axis: ParameterAxis): number[] {
  const length = axis === "theta" ? grid.rows : grid.cols;
  const sums = new Array<number>(length).fill(0);
  for (let i = 0; i < grid.rows; i++) {
    for (let j = 0; j < grid.cols; j++) {
      sums[axis === "theta" ? i : j] += grid.get(i, j);
    }
  }
  return sums;
}

/**
 * Marginal distribution over `axis`, renormalized to sum to 1. Works the same
 * on prior and posterior grids.
 */
export function marginalize(grid: IJointGrid, axis: ParameterAxis): Marginal {
  return normalizeVector(sumOut(grid, axis)).normalized;
}

export interface MarginalSummary {
  mean: number;
  sd: number;
  /** Axis value with the most mass. */
  mode: number;
  modeIndex: number;
}

/** Moments and mode of a normalized marginal over the given axis values. */
export function marginalSummary(axisValues: Axis, marginal: Marginal): MarginalSummary {
  if (axisValues.length !== marginal.length) {
    throw new RangeError(`Axis has ${axisValues.length} values but marginal has ${marginal.length}`);
  }
  let mean = 0;
  for (let k = 0; k < marginal.length; k++) {
    mean += axisValues[k] * marginal[k];
  }
  let variance = 0;
  for (let k = 0; k < marginal.length; k++) {
    const d = axisValues[k] - mean;
    variance += d * d * marginal[k];
  }
  const modeIndex = argMax(marginal);
  return { mean, sd: Math.sqrt(variance), mode: axisValues[modeIndex], modeIndex };
}

/** True when the values rise (weakly) to a single peak and then fall (weakly). */
export function isUnimodal(marginal: Marginal): boolean {
  let k = 1;
  while (k < marginal.length && marginal[k] >= marginal[k - 1]) k++;
  while (k < marginal.length && marginal[k] <= marginal[k - 1]) k++;
  return k === marginal.length;
}
