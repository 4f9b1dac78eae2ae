#!/usr/bin/env -S node --import tsx
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createServer, SERVER_NAME, SERVER_VERSION } from "./server.js";

const config = loadConfig();
const logger = createLogger("BondMcp", config.logLevel);
const server = createServer(config, logger);

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info(`${SERVER_NAME} ${SERVER_VERSION} listening on stdio`, {
  ytmTolerance: config.ytmTolerance,
  ytmMaxIterations: config.ytmMaxIterations,
});
