import { z } from "zod";
import { BondTermsSchema, RequiredYieldSchema, YtmMaxIterationsSchema, YtmToleranceSchema } from "./common.js";

export const ScenarioAnalysisSchema = BondTermsSchema.extend({
  required_yield: RequiredYieldSchema,
  yield_shifts: z
    .array(z.number())
    .min(1)
    .optional()
    .describe("Parallel yield shifts as decimals (default [-0.02, -0.01, 0, 0.01, 0.02])"),
});

export const FrequencyAnalysisSchema = BondTermsSchema.extend({
  required_yield: RequiredYieldSchema,
  frequencies: z
    .array(z.number().int().positive())
    .min(1)
    .optional()
    .describe("Coupon frequencies to compare (default [1, 2, 4])"),
});

export const BondAnalysisSchema = BondTermsSchema.extend({
  required_yield: RequiredYieldSchema,
  tolerance: YtmToleranceSchema,
  max_iterations: YtmMaxIterationsSchema,
  sensitivity_step: z
    .number()
    .positive()
    .optional()
    .describe("Yield step of the price sensitivity sweep (default 0.005)"),
});
