// ── Grid ──

/** Default number of cells along each parameter axis. */
export const DEFAULT_RESOLUTION = 100;

// ── Prior ──

/** Default Beta shape `a` of the hyperprior on mu. */
export const DEFAULT_HYPERPRIOR_A = 2;

/** Default Beta shape `b` of the hyperprior on mu. */
export const DEFAULT_HYPERPRIOR_B = 2;

/**
 * Default confidence linking theta to mu: theta | mu ~ Beta(c·mu, c·(1 - mu)).
 * Larger values pull theta tighter around mu.
 */
export const DEFAULT_CONFIDENCE = 100;

// ── Numerics ──

/**
 * Finite stand-in for a density that overflowed or came out undefined.
 * The product of two clamped densities (prior = conditional × hyperprior) stays finite.
 */
export const DENSITY_CEILING = 1e150;

/** Tolerance for "sums to 1" checks on normalized grids and marginals. */
export const NORMALIZATION_TOLERANCE = 1e-9;
