export * from "./constants";
export type { Axis, GridFunction, IJointGrid, Marginal, Normalized, ParameterAxis } from "./types/grid-types";
export { makeAxis, JointGrid } from "./inference/grid";
export { betaDensity, ClampCounter } from "./inference/density";
export type { DensityFn } from "./inference/density";
export { buildJoint, broadcastColumns } from "./inference/joint-builder";
export { hierarchicalPrior, buildPriorGrid } from "./inference/prior";
export type { PriorParams } from "./inference/prior";
export {
  coinLikelihood, coinLikelihoodAt, thetaLikelihoodVector, buildLikelihoodGrid, buildLikelihoodGridFull,
} from "./inference/likelihood";
export type { Observations } from "./inference/likelihood";
export { normalizeGrid, normalizeVector } from "./inference/normalize";
export { combine } from "./inference/posterior";
export type { PosteriorResult } from "./inference/posterior";
export { marginalize, sumOut, marginalSummary, isUnimodal } from "./inference/marginal";
export type { MarginalSummary } from "./inference/marginal";
export { modelParamsSchema, parseModelParams } from "./inference/params";
export type { ModelParams, ModelParamsInput } from "./inference/params";
export { runPipeline } from "./inference/pipeline";
export type { PipelineResult } from "./inference/pipeline";
export * from "./inference/errors";
export { logDebug, logInfo, logWarning, logError, setLogLevel } from "./utils/logger";
