#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadEnv, workspaceConfigFromEnv } from "./config.js";
import { createLogger, toLoggerFn } from "./logger.js";
import { createMcpServer } from "./mcp/mcpServer.js";
import { Dispatcher } from "./tools/dispatcher.js";
import { buildToolTable } from "./tools/toolTable.js";
import { createWorkspace } from "./workspace.js";

async function main() {
  const env = loadEnv();
  const logger = createLogger({ level: env.LOG_LEVEL, pretty: env.LOG_PRETTY });
  const config = workspaceConfigFromEnv(env);

  const workspace = await createWorkspace(config, { log: toLoggerFn(logger.child({ module: "workspace" }), "debug") });
  const dispatcher = new Dispatcher({
    workspace,
    tools: buildToolTable(),
    log: toLoggerFn(logger.child({ module: "dispatcher" })),
  });
  const server = createMcpServer(dispatcher);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "shutting down");
    try {
      await server.close();
    } catch (err) {
      logger.warn({ err }, "server close failed");
    }
    process.exit(0);
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  await server.connect(new StdioServerTransport());
  logger.info(
    { root: workspace.guard.root, tools: dispatcher.tools.length, playbookCommand: config.engine.playbookCommand },
    "ansible workspace MCP server started",
  );
}

main().catch((err) => {
  // stdout belongs to the protocol stream
  process.stderr.write(`fatal: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
  process.exit(1);
});
