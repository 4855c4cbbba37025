import type { Axis, Marginal } from "../types/grid-types";
import { logDebug } from "../utils/logger";
import { makeAxis, JointGrid } from "./grid";
import { buildLikelihoodGrid } from "./likelihood";
import { marginalize } from "./marginal";
import { normalizeGrid } from "./normalize";
import { parseModelParams, ModelParams, ModelParamsInput } from "./params";
import { combine } from "./posterior";
import { buildPriorGrid } from "./prior";

export interface PipelineResult {
  params: ModelParams;
  thetaAxis: Axis;
  muAxis: Axis;
  /** Normalized prior grid. */
  prior: JointGrid;
  /** Sum of the prior grid before normalization. */
  priorMass: number;
  /** Raw likelihood surface; not a distribution, so not normalized. */
  likelihood: JointGrid;
  /** Normalized posterior grid. */
  posterior: JointGrid;
  evidence: number;
  priorTheta: Marginal;
  priorMu: Marginal;
  posteriorTheta: Marginal;
  posteriorMu: Marginal;
}

/**
 * Run the full update.
 *
 * 1. Build theta and mu axes
 * 2. Build the raw prior and likelihood grids (independent of each other)
 * 3. Combine into the posterior and evidence
 * 4. Marginalize prior and posterior onto each axis
 *
 * Every stage takes its inputs as arguments and returns new values, so two
 * runs with the same parameters produce identical results.
 */
export function runPipeline(input: ModelParamsInput): PipelineResult {
  const params = parseModelParams(input);

  // Step 1: Axes
  const thetaAxis = makeAxis(params.resolution);
  const muAxis = makeAxis(params.resolution);

  // Step 2: Raw grids
  const rawPrior = buildPriorGrid(thetaAxis, muAxis, params);
  const likelihood = buildLikelihoodGrid(thetaAxis, muAxis, params);

  // Step 3: Posterior from the raw grids. The prior is normalized on its own
  // only for output; combine() never sees the normalized copy.
  const { posterior, evidence } = combine(rawPrior, likelihood);
  const { normalized: prior, mass: priorMass } = normalizeGrid(rawPrior);

  logDebug("Posterior computed", {
    resolution: params.resolution,
    heads: params.heads,
    tails: params.tails,
    evidence,
  });

  // Step 4: Marginals
  return {
    params,
    thetaAxis,
    muAxis,
    prior,
    priorMass,
    likelihood,
    posterior,
    evidence,
    priorTheta: marginalize(prior, "theta"),
    priorMu: marginalize(prior, "mu"),
    posteriorTheta: marginalize(posterior, "theta"),
    posteriorMu: marginalize(posterior, "mu"),
  };
}
