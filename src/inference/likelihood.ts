import type { Axis, GridFunction } from "../types/grid-types";
import { broadcastColumns, buildJoint } from "./joint-builder";
import type { JointGrid } from "./grid";

/** Observed coin flips. */
export interface Observations {
  heads: number;
  tails: number;
}

/** theta^heads · (1 - theta)^tails */
export function coinLikelihoodAt(theta: number, { heads, tails }: Observations): number {
  return Math.pow(theta, heads) * Math.pow(1 - theta, tails);
}

/**
 * Likelihood as a function on the (theta, mu) grid. The data only depend on
 * theta, so the value is constant along mu.
 */
export function coinLikelihood(observations: Observations): GridFunction {
  return (theta) => coinLikelihoodAt(theta, observations);
}

/** Likelihood at each theta value. */
export function thetaLikelihoodVector(thetaAxis: Axis, observations: Observations): number[] {
  return thetaAxis.map((theta) => coinLikelihoodAt(theta, observations));
}

/**
 * Likelihood grid over (thetaAxis × muAxis). Built from the per-theta vector
 * and broadcast across mu; same values as buildJoint(thetaAxis, muAxis, coinLikelihood(obs)).
 * This is a likelihood surface, not a distribution, and is left unnormalized.
 */
export function buildLikelihoodGrid(thetaAxis: Axis, muAxis: Axis, observations: Observations): JointGrid {
  return broadcastColumns(thetaLikelihoodVector(thetaAxis, observations), muAxis.length);
}

/** Full outer evaluation of the likelihood, without the broadcast shortcut. */
export function buildLikelihoodGridFull(thetaAxis: Axis, muAxis: Axis, observations: Observations): JointGrid {
  return buildJoint(thetaAxis, muAxis, coinLikelihood(observations));
}
