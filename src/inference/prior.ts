import type { Axis, GridFunction } from "../types/grid-types";
import { logWarning } from "../utils/logger";
import { betaDensity, ClampCounter } from "./density";
import { buildJoint } from "./joint-builder";
import type { JointGrid } from "./grid";

export interface PriorParams {
  hyperpriorA: number;   // Beta shape a of mu
  hyperpriorB: number;   // Beta shape b of mu
  confidence: number;    // c in theta | mu ~ Beta(c·mu, c·(1 - mu))
}

/**
 * Hierarchical prior density:
 *
 *   p(theta, mu) = Beta(theta; c·mu, c·(1 - mu)) · Beta(mu; a, b)
 *
 * Near mu = 0 or 1 one of the conditional shapes approaches 0; those
 * evaluations are clamped by betaDensity and tallied in `clamps`.
 */
export function hierarchicalPrior(params: PriorParams, clamps?: ClampCounter): GridFunction {
  const { hyperpriorA, hyperpriorB, confidence } = params;
  return (theta, mu) =>
    betaDensity(theta, confidence * mu, confidence * (1 - mu), clamps) *
    betaDensity(mu, hyperpriorA, hyperpriorB, clamps);
}

/** Unnormalized prior grid over (thetaAxis × muAxis). */
export function buildPriorGrid(thetaAxis: Axis, muAxis: Axis, params: PriorParams): JointGrid {
  const clamps = new ClampCounter();
  const grid = buildJoint(thetaAxis, muAxis, hierarchicalPrior(params, clamps));
  if (clamps.count > 0) {
    logWarning("Prior density clamped at extreme shape parameters", {
      clampedEvaluations: clamps.count,
      cells: grid.rows * grid.cols,
    });
  }
  return grid;
}
