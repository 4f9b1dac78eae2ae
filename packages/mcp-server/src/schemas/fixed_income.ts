import { z } from "zod";
import { BondTermsSchema, RequiredYieldSchema, YtmMaxIterationsSchema, YtmToleranceSchema } from "./common.js";

export const PresentValueSchema = BondTermsSchema.extend({
  rate: z.number().describe("Annual discount rate as decimal, compounded at the payment frequency"),
});

export const YieldToMaturitySchema = BondTermsSchema.extend({
  tolerance: YtmToleranceSchema,
  max_iterations: YtmMaxIterationsSchema,
  require_convergence: z
    .boolean()
    .optional()
    .default(false)
    .describe("Fail instead of returning a best-effort estimate when the search does not converge"),
});

export const DurationSchema = BondTermsSchema.extend({
  required_yield: RequiredYieldSchema,
});

export const CurrentYieldSchema = BondTermsSchema;

export const BreakEvenYieldSchema = BondTermsSchema.extend({
  reference_price: z
    .number()
    .positive()
    .optional()
    .describe("Price to break even against (defaults to the market price)"),
});

export const CashFlowScheduleSchema = BondTermsSchema;
