#!/usr/bin/env node
/**
 * revlift MCP server
 *
 * Publishes a linear stack of git commits as code-review patches. Exposes
 * range resolution, per-commit change sets, the Mercurial hash crosswalk,
 * review-service payload translation and history rewriting over the Model
 * Context Protocol, for an orchestration layer that talks to the review
 * service itself.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { logger } from "./logger.js";
import { createServer } from "./server.js";

async function main() {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ cwd: process.cwd() }, "revlift MCP server running on stdio");
}

main().catch((error) => {
  logger.fatal({ err: error }, "fatal error in main()");
  process.exit(1);
});
