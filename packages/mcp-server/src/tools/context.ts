import { ZodError } from "zod";
import { BondValuationEngine, isBondEngineError, type YtmOptions } from "bond-engine";
import type { AppConfig } from "../config.js";
import type { Logger } from "../logger.js";

export interface ToolContext {
  config: AppConfig;
  logger: Logger;
}

export interface BondTermsParams {
  face_value: number;
  coupon_rate: number;
  market_price: number;
  remaining_years: number;
  payment_frequency: number;
  required_yield?: number;
}

export function toEngine(params: BondTermsParams): BondValuationEngine {
  return BondValuationEngine.create({
    faceValue: params.face_value,
    couponRate: params.coupon_rate,
    marketPrice: params.market_price,
    remainingYears: params.remaining_years,
    paymentFrequency: params.payment_frequency,
    requiredYield: params.required_yield,
  });
}

export function ytmOptions(ctx: ToolContext, params: { tolerance?: number; max_iterations?: number }): YtmOptions {
  return {
    tolerance: params.tolerance ?? ctx.config.ytmTolerance,
    maxIterations: params.max_iterations ?? ctx.config.ytmMaxIterations,
  };
}

/**
 * Run a tool body. Domain and validation failures come back as the Error so
 * wrapResponse can turn them into an error result; anything else propagates.
 */
export function evaluate<T>(ctx: ToolContext, tool: string, body: () => T): T | Error {
  ctx.logger.debug("tool call", { tool });
  try {
    return body();
  } catch (err) {
    if (isBondEngineError(err) || err instanceof ZodError) {
      ctx.logger.warn(`${tool} rejected`, { error: err.message });
      return err;
    }
    throw err;
  }
}
