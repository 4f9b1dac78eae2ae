import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { cashFlowSchedule, requireConverged } from "bond-engine";
import {
  PresentValueSchema,
  YieldToMaturitySchema,
  DurationSchema,
  CurrentYieldSchema,
  BreakEvenYieldSchema,
  CashFlowScheduleSchema,
} from "../schemas/fixed_income.js";
import { wrapResponse, coerceNumbers } from "../formatters/response.js";
import { cashFlowJson, solutionJson } from "../formatters/serialize.js";
import { evaluate, toEngine, ytmOptions, type ToolContext } from "./context.js";

export function registerFixedIncomeTools(server: McpServer, ctx: ToolContext) {
  server.tool(
    "bond_present_value",
    "Discount every coupon and the final face repayment at a flat annual rate compounded at the payment frequency. Returns the present value (model price).",
    PresentValueSchema.shape,
    async (params) => {
      const result = evaluate(ctx, "bond_present_value", () => {
        const validated = PresentValueSchema.parse(coerceNumbers(params));
        const engine = toEngine(validated);
        return { rate: validated.rate, present_value: engine.presentValue(validated.rate) };
      });
      return wrapResponse(result);
    }
  );

  server.tool(
    "bond_yield_to_maturity",
    "Solve for yield to maturity by bisection over 0%-100%: the rate whose present value matches the market price within tolerance. Reports whether the search converged.",
    YieldToMaturitySchema.shape,
    async (params) => {
      const result = evaluate(ctx, "bond_yield_to_maturity", () => {
        const validated = YieldToMaturitySchema.parse(coerceNumbers(params));
        const solution = toEngine(validated).solveYtm(ytmOptions(ctx, validated));
        if (!solution.converged) {
          ctx.logger.warn("YTM search did not converge", { iterations: solution.iterations, rate: solution.rate });
        }
        if (validated.require_convergence) requireConverged(solution);
        return { ytm: solution.rate, ...solutionJson(solution) };
      });
      return wrapResponse(result);
    }
  );

  server.tool(
    "bond_duration",
    "Macaulay duration (in coupon periods), modified duration and convexity at the required yield. Derives the yield from the market price when none is given.",
    DurationSchema.shape,
    async (params) => {
      const result = evaluate(ctx, "bond_duration", () => {
        const validated = DurationSchema.parse(coerceNumbers(params));
        const engine = toEngine(validated).ensureYield(ytmOptions(ctx, {}));
        return {
          required_yield: engine.requiredYield,
          yield_source: engine.yieldSource,
          macaulay_duration: engine.macaulayDuration(),
          modified_duration: engine.modifiedDuration(),
          convexity: engine.convexity(),
        };
      });
      return wrapResponse(result);
    }
  );

  server.tool(
    "bond_current_yield",
    "Current yield: the per-period coupon divided by the market price",
    CurrentYieldSchema.shape,
    async (params) => {
      const result = evaluate(ctx, "bond_current_yield", () => {
        const validated = CurrentYieldSchema.parse(coerceNumbers(params));
        return { current_yield: toEngine(validated).currentYield() };
      });
      return wrapResponse(result);
    }
  );

  server.tool(
    "bond_break_even_yield",
    "Break-even yield: bisection over 0%-100% until the yield bracket is narrower than 1e-6, against a reference price (default: market price)",
    BreakEvenYieldSchema.shape,
    async (params) => {
      const result = evaluate(ctx, "bond_break_even_yield", () => {
        const validated = BreakEvenYieldSchema.parse(coerceNumbers(params));
        const referencePrice = validated.reference_price ?? validated.market_price;
        const solution = toEngine(validated).solveBreakEvenYield(referencePrice);
        return { reference_price: referencePrice, break_even_yield: solution.rate, ...solutionJson(solution) };
      });
      return wrapResponse(result);
    }
  );

  server.tool(
    "bond_cash_flows",
    "Cash-flow schedule: period, payment time in years and payment (coupon, plus face value at maturity)",
    CashFlowScheduleSchema.shape,
    async (params) => {
      const result = evaluate(ctx, "bond_cash_flows", () => {
        const validated = CashFlowScheduleSchema.parse(coerceNumbers(params));
        return { cash_flows: cashFlowSchedule(toEngine(validated).terms).map(cashFlowJson) };
      });
      return wrapResponse(result);
    }
  );
}
