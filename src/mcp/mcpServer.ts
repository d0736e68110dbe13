import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import type { Dispatcher } from "../tools/dispatcher.js";
import type { ToolDefinition } from "../tools/types.js";

export const SERVER_INFO = { name: "ansible-workspace-mcp", version: "0.1.0" } as const;

function inputShape(tool: ToolDefinition) {
  return Object.fromEntries(
    Object.entries(tool.args).map(([name, description]) => [name, z.string().default("").describe(description)]),
  );
}

/** One MCP tool per dispatch-table entry; each result is a single text item. */
export function createMcpServer(dispatcher: Dispatcher): McpServer {
  const server = new McpServer(SERVER_INFO, {
    instructions:
      "Tools for inspecting, editing and running an Ansible workspace (inventory, variables, ansible.cfg, playbooks, templates) and for running Ansible modules against network devices.",
  });

  for (const tool of dispatcher.tools) {
    server.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: inputShape(tool),
        annotations: {
          readOnlyHint: !tool.mutating,
          destructiveHint: tool.mutating,
          openWorldHint: false,
        },
      },
      async (args, extra) => ({
        content: [{ type: "text" as const, text: await dispatcher.call(tool.name, args, extra.signal) }],
      }),
    );
  }

  return server;
}
