import { requiredArg } from "./args.js";
import { defineTool, success, type ToolDefinition } from "./types.js";

export const configTools: readonly ToolDefinition[] = [
  defineTool({
    name: "ansible_read_config",
    description: "Read ansible.cfg.",
    args: {},
    mutating: false,
    parse: () => null,
    execute: ({ workspace }) => workspace.engineConfig.read(),
    render: (content) => success(`=== ansible.cfg ===\n\n${content}`),
  }),
  defineTool({
    name: "ansible_write_config",
    description: "Replace ansible.cfg. The old file is backed up.",
    args: { content: "Full ansible.cfg content" },
    mutating: true,
    parse: (args) => ({ content: requiredArg(args, "content", "content") }),
    execute: ({ workspace }, req) => workspace.engineConfig.write(req.content),
    render: (res) => success(`ansible.cfg updated.${res.backup ? `\nBackup saved to: ${res.backup.backupPath}` : ""}`),
  }),
];
