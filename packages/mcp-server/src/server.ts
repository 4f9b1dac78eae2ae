import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerFixedIncomeTools } from "./tools/fixed_income.js";
import { registerScenarioTools } from "./tools/scenarios.js";
import type { AppConfig } from "./config.js";
import type { Logger } from "./logger.js";

export const SERVER_NAME = "bond-analytics-mcp";
export const SERVER_VERSION = "0.1.0";

export function createServer(config: AppConfig, logger: Logger): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const ctx = { config, logger };
  registerFixedIncomeTools(server, ctx);
  registerScenarioTools(server, ctx);

  return server;
}
