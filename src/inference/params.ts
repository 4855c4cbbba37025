import { z } from "zod";
import {
  DEFAULT_CONFIDENCE, DEFAULT_HYPERPRIOR_A, DEFAULT_HYPERPRIOR_B, DEFAULT_RESOLUTION,
} from "../constants";
import { InvalidModelParamsError } from "./errors";

const positiveShape = z.number().finite().positive();
const flipCount = z.number().int().nonnegative();

export const modelParamsSchema = z.object({
  resolution: z.number().int().positive().default(DEFAULT_RESOLUTION),
  hyperpriorA: positiveShape.default(DEFAULT_HYPERPRIOR_A),
  hyperpriorB: positiveShape.default(DEFAULT_HYPERPRIOR_B),
  confidence: positiveShape.default(DEFAULT_CONFIDENCE),
  heads: flipCount,
  tails: flipCount,
});

/** Fully-populated model parameters. */
export type ModelParams = z.infer<typeof modelParamsSchema>;

/** Caller-supplied parameters; everything except the observed counts has a default. */
export type ModelParamsInput = z.input<typeof modelParamsSchema>;

/** Validate raw input and fill defaults. Throws InvalidModelParamsError listing every problem. */
export function parseModelParams(input: unknown): ModelParams {
  const result = modelParamsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidModelParamsError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "params"}: ${issue.message}`),
    );
  }
  return result.data;
}
