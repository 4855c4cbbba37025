import type { Marginal, Normalized } from "../types/grid-types";
import { sumValues } from "../utils/grid-utils";
import { DegenerateNormalizationError } from "./errors";
import type { JointGrid } from "./grid";

function checkedMass(mass: number): number {
  if (!Number.isFinite(mass) || mass <= 0) {
    throw new DegenerateNormalizationError(mass);
  }
  return mass;
}

/** Rescale a joint grid to sum to 1; `mass` is its sum before rescaling. */
export function normalizeGrid(grid: JointGrid): Normalized<JointGrid> {
  const mass = checkedMass(grid.sum());
  return { normalized: grid.map((v) => v / mass), mass };
}

/** Rescale a vector to sum to 1; `mass` is its sum before rescaling. */
export function normalizeVector(vector: readonly number[]): Normalized<Marginal> {
  const negative = vector.findIndex((v) => v < 0);
  if (negative >= 0) {
    throw new RangeError(`Vector entries must be non-negative, got ${vector[negative]} at index ${negative}`);
  }
  const mass = checkedMass(sumValues(vector));
  return { normalized: Object.freeze(vector.map((v) => v / mass)), mass };
}
