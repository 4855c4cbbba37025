import { jStat } from "jstat";
import { DENSITY_CEILING } from "../constants";
import { InvalidShapeParametersError } from "./errors";

/**
 * Univariate density on [0, 1] with two shape parameters. Always returns a
 * finite, non-negative value; clamped evaluations are tallied in `clamps`.
 */
export type DensityFn = (x: number, shapeA: number, shapeB: number, clamps?: ClampCounter) => number;

/** Counts evaluations that had to be clamped, so a caller can report them once per grid. */
export class ClampCounter {
  count = 0;

  record(): void {
    this.count++;
  }
}

function validShape(shape: number): boolean {
  return Number.isFinite(shape) && shape >= 0;
}

/**
 * Beta(a, b) density at x.
 *
 * Shapes near zero make the density blow up at the ends of [0, 1]; any overflow,
 * NaN, or value above DENSITY_CEILING comes back as DENSITY_CEILING so later sums
 * stay finite. Outside [0, 1] the density is 0.
 */
export const betaDensity: DensityFn = (x, shapeA, shapeB, clamps) => {
  if (!validShape(shapeA) || !validShape(shapeB)) {
    throw new InvalidShapeParametersError(shapeA, shapeB);
  }
  if (x < 0 || x > 1) return 0;

  const value = jStat.beta.pdf(x, shapeA, shapeB);
  if (Number.isNaN(value) || value > DENSITY_CEILING) {
    clamps?.record();
    return DENSITY_CEILING;
  }
  return Math.max(0, value);
};
