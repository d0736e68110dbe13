import { configTools } from "./configTools.js";
import { deviceTools } from "./deviceTools.js";
import { inventoryTools } from "./inventoryTools.js";
import { playbookTools } from "./playbookTools.js";
import { templateTools } from "./templateTools.js";
import type { ToolDefinition } from "./types.js";
import { varsTools } from "./varsTools.js";
import { workspaceTools } from "./workspaceTools.js";

/** Every tool the server exposes, in listing order. Names are unique. */
export function buildToolTable(): ReadonlyMap<string, ToolDefinition> {
  const table = new Map<string, ToolDefinition>();
  for (const tool of [
    ...workspaceTools,
    ...inventoryTools,
    ...varsTools,
    ...configTools,
    ...playbookTools,
    ...deviceTools,
    ...templateTools,
  ]) {
    if (table.has(tool.name)) throw new Error(`duplicate tool name: ${tool.name}`);
    table.set(tool.name, tool);
  }
  return table;
}
