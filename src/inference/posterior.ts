import type { JointGrid } from "./grid";
import { normalizeGrid } from "./normalize";

export interface PosteriorResult {
  posterior: JointGrid;
  /** Mass of prior ⊙ likelihood before normalization: the marginal likelihood of the data. */
  evidence: number;
}

/**
 * Bayes' rule on a grid: elementwise product of the raw prior and likelihood,
 * then one global normalization.
 *
 * Neither input is normalized first: `evidence` is the mass of the raw product.
 * Rescaling either input by c > 0 leaves `posterior` unchanged and scales
 * `evidence` by c.
 */
export function combine(prior: JointGrid, likelihood: JointGrid): PosteriorResult {
  const unnormalized = prior.hadamard(likelihood);
  const { normalized, mass } = normalizeGrid(unnormalized);
  return { posterior: normalized, evidence: mass };
}
