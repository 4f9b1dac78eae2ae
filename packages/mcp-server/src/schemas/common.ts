import { z } from "zod";

export const BondTermsSchema = z.object({
  face_value: z.number().positive().describe("Par / face value repaid at maturity (e.g. 1000)"),
  coupon_rate: z.number().min(0).describe("Annual coupon rate as decimal (0.05 = 5%)"),
  market_price: z.number().positive().describe("Observed market price of the bond"),
  remaining_years: z.number().int().positive().describe("Whole years remaining to maturity"),
  payment_frequency: z.number().int().positive().describe("Coupons per year: 1, 2, 4, or 12"),
});

export const RequiredYieldSchema = z
  .number()
  .optional()
  .describe("Required yield as decimal (0.06 = 6%). Omit or pass -1 to derive it from the market price");

export const YtmToleranceSchema = z
  .number()
  .positive()
  .optional()
  .describe("Absolute price tolerance for the YTM search (default 1e-6)");

export const YtmMaxIterationsSchema = z
  .number()
  .int()
  .positive()
  .max(100_000)
  .optional()
  .describe("Iteration cap for the YTM search (default 1000)");
