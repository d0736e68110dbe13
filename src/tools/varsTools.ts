import { stringify } from "yaml";

import type { VarScope } from "../modules/vars/variableStore.js";
import type { WriteOutcome } from "../modules/workspace/managedFiles.js";
import { requiredArg } from "./args.js";
import { defineTool, success, type ToolDefinition } from "./types.js";

function writeReply(res: WriteOutcome) {
  return success(
    `${res.created ? "Created" : "Updated"} ${res.path}${res.backup ? `\nBackup saved to: ${res.backup.backupPath}` : ""}`,
  );
}

function scopeTools(scope: VarScope, argName: string, label: string): ToolDefinition[] {
  return [
    defineTool({
      name: `ansible_read_${scope}_vars`,
      description: `Read the ${scope}_vars file of a ${label}.`,
      args: { [argName]: `${label[0].toUpperCase()}${label.slice(1)} name` },
      mutating: false,
      parse: (args) => ({ name: requiredArg(args, argName, "name") }),
      execute: ({ workspace }, req) => workspace.vars.read(scope, req.name),
      render: (file) => success(`=== ${file.path} ===\n\n${file.content}`),
    }),
    defineTool({
      name: `ansible_write_${scope}_vars`,
      description: `Write the ${scope}_vars file of a ${label}. Content must be a YAML mapping; the old file is backed up.`,
      args: { [argName]: `${label[0].toUpperCase()}${label.slice(1)} name`, content: "YAML mapping" },
      mutating: true,
      parse: (args) => ({ name: requiredArg(args, argName, "name"), content: requiredArg(args, "content", "content") }),
      execute: ({ workspace }, req) => workspace.vars.write(scope, req.name, req.content),
      render: writeReply,
    }),
  ];
}

export const varsTools: readonly ToolDefinition[] = [
  defineTool({
    name: "ansible_list_vars",
    description: "List group_vars and host_vars files.",
    args: {},
    mutating: false,
    parse: () => null,
    execute: ({ workspace }) => workspace.vars.list(),
    render: (entries) => {
      const section = (scope: VarScope) => {
        const names = entries.filter((e) => e.scope === scope).map((e) => `  - ${e.name}`);
        return [`${scope}_vars:`, ...(names.length ? names : ["  (none)"])];
      };
      return success(["=== VARIABLE FILES ===", "", ...section("group"), "", ...section("host")].join("\n"));
    },
  }),
  ...scopeTools("group", "group_name", "group"),
  ...scopeTools("host", "hostname", "host"),
  defineTool({
    name: "ansible_show_host_vars",
    description:
      "Show the effective variables of a host: inventory vars, then group_vars files, then its host_vars file (later wins).",
    args: { hostname: "Inventory host name" },
    mutating: false,
    parse: (args) => ({ host: requiredArg(args, "hostname", "name") }),
    execute: ({ workspace }, req) => workspace.vars.effective(req.host),
    render: (eff) => {
      const sources = Object.entries(eff.sources).map(([k, s]) => `  ${k}: ${s}`);
      return success(
        [
          `=== EFFECTIVE VARIABLES: ${eff.host} ===`,
          `Groups: ${eff.groups.join(" < ")}`,
          "",
          Object.keys(eff.vars).length ? stringify(eff.vars).trimEnd() : "(no variables)",
          ...(sources.length ? ["", "Sources:", ...sources] : []),
        ].join("\n"),
      );
    },
  }),
];
