import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { analyzeBond, frequencyAnalysis, scenarioAnalysis } from "bond-engine";
import {
  ScenarioAnalysisSchema,
  FrequencyAnalysisSchema,
  BondAnalysisSchema,
} from "../schemas/scenarios.js";
import { wrapResponse, coerceNumbers } from "../formatters/response.js";
import { frequencyJson, reportJson, scenarioJson } from "../formatters/serialize.js";
import { evaluate, toEngine, ytmOptions, type ToolContext } from "./context.js";

export function registerScenarioTools(server: McpServer, ctx: ToolContext) {
  server.tool(
    "bond_scenario_analysis",
    "Shift the required yield in parallel (default -2%, -1%, 0, +1%, +2%) and report price, Macaulay and modified duration and convexity at each shifted yield",
    ScenarioAnalysisSchema.shape,
    async (params) => {
      const result = evaluate(ctx, "bond_scenario_analysis", () => {
        const validated = ScenarioAnalysisSchema.parse(coerceNumbers(params));
        const engine = toEngine(validated).ensureYield(ytmOptions(ctx, {}));
        return {
          required_yield: engine.requiredYield,
          yield_source: engine.yieldSource,
          scenarios: scenarioAnalysis(engine, validated.yield_shifts).map(scenarioJson),
        };
      });
      return wrapResponse(result);
    }
  );

  server.tool(
    "bond_frequency_analysis",
    "Compare the same bond paying annual, semi-annual and quarterly coupons (or the given frequencies) at the required yield: price, durations and convexity",
    FrequencyAnalysisSchema.shape,
    async (params) => {
      const result = evaluate(ctx, "bond_frequency_analysis", () => {
        const validated = FrequencyAnalysisSchema.parse(coerceNumbers(params));
        const engine = toEngine(validated).ensureYield(ytmOptions(ctx, {}));
        return {
          required_yield: engine.requiredYield,
          yield_source: engine.yieldSource,
          frequencies: frequencyAnalysis(engine, validated.frequencies).map(frequencyJson),
        };
      });
      return wrapResponse(result);
    }
  );

  server.tool(
    "bond_analysis",
    "Full bond report: price at the required yield, YTM, Macaulay/modified duration, convexity, current yield, price sensitivity, break-even yield, scenarios, frequency comparison and cash-flow schedule",
    BondAnalysisSchema.shape,
    async (params) => {
      const result = evaluate(ctx, "bond_analysis", () => {
        const validated = BondAnalysisSchema.parse(coerceNumbers(params));
        const report = analyzeBond(toEngine(validated), {
          ytm: ytmOptions(ctx, validated),
          sensitivity: { step: validated.sensitivity_step ?? ctx.config.sensitivityStep },
        });
        if (!report.ytm.converged) {
          ctx.logger.warn("YTM search did not converge", { iterations: report.ytm.iterations, rate: report.ytm.rate });
        }
        return reportJson(report);
      });
      return wrapResponse(result);
    }
  );
}
