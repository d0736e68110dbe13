import { CONFIG_DISPLAY_FORMATS } from "../modules/devices/deviceCommands.js";
import { sanitize } from "../modules/security/sanitize.js";
import { choiceArg, flagArg, isBlank, listArg, optionalArg, rawArg, requiredArg, targetArg } from "./args.js";
import { defineTool, engineReply, success, type ToolDefinition } from "./types.js";

export const deviceTools: readonly ToolDefinition[] = [
  defineTool({
    name: "ansible_adhoc_command",
    description:
      "Run an ad-hoc module against inventory hosts, e.g. junipernetworks.junos.junos_command or ping. Shell-executing modules are refused.",
    args: {
      module_name: "Fully qualified module name",
      module_args: "Module arguments (key=value ...)",
      target_hosts: "Host pattern (default: all)",
    },
    mutating: true,
    parse: (args) => ({
      module: requiredArg(args, "module_name", "name"),
      args: optionalArg(args, "module_args", "text"),
      target: targetArg(args, "target_hosts"),
    }),
    execute: ({ workspace, signal }, req) => workspace.devices.adhoc({ ...req, signal }),
    render: (report) => engineReply(report),
  }),

  defineTool({
    name: "ansible_ping_devices",
    description: "Test connectivity to inventory hosts with the ping module.",
    args: { target_hosts: "Host pattern (default: all)" },
    mutating: false,
    parse: (args) => ({ target: targetArg(args, "target_hosts") }),
    execute: ({ workspace, signal }, req) => workspace.devices.ping(req.target, signal),
    render: (report) =>
      engineReply(report, `=== CONNECTIVITY ===\nReachable: ${report.reachable}\nFailed: ${report.failed}\n`),
  }),

  defineTool({
    name: "ansible_get_facts",
    description: "Gather Junos device facts. gather_subset limits collection (e.g. hardware, config, interfaces).",
    args: { target_hosts: "Host pattern (default: all)", gather_subset: "Comma separated fact subsets" },
    mutating: false,
    parse: (args) => ({
      target: targetArg(args, "target_hosts"),
      subset: optionalArg(args, "gather_subset", "pattern"),
    }),
    execute: ({ workspace, signal }, req) => workspace.devices.facts(req.target, req.subset, signal),
    render: (output) => success(output),
  }),

  defineTool({
    name: "ansible_get_config",
    description: "Retrieve the running configuration of Junos devices. Formats: text, set, json, xml.",
    args: { target_hosts: "Host pattern (default: all)", config_format: "text | set | json | xml" },
    mutating: false,
    parse: (args) => ({
      target: targetArg(args, "target_hosts"),
      format: choiceArg(args, "config_format", CONFIG_DISPLAY_FORMATS, "text"),
    }),
    execute: ({ workspace, signal }, req) => workspace.devices.runningConfig(req.target, req.format, signal),
    render: (output) => success(output),
  }),

  defineTool({
    name: "ansible_run_command",
    description: "Run operational commands (e.g. show version) on Junos devices. Separate several with commas.",
    args: { target_hosts: "Host pattern (default: all)", commands: "Comma separated commands" },
    mutating: false,
    parse: (args) => ({
      target: targetArg(args, "target_hosts"),
      commands: listArg(args, "commands", "text"),
    }),
    execute: ({ workspace, signal }, req) => workspace.devices.runCommands(req.target, req.commands, signal),
    render: (output) => success(output),
  }),

  defineTool({
    name: "ansible_push_config",
    description:
      "Merge configuration lines (one per line) into Junos devices. commit=no leaves a candidate only; check_mode=yes is a dry run.",
    args: {
      target_hosts: "Host pattern (required)",
      config_lines: "Configuration lines in set format, one per line",
      commit: "yes (default) or no",
      check_mode: "Set to 'yes' for a dry run",
    },
    mutating: true,
    parse: (args) => ({
      target: requiredArg(args, "target_hosts", "pattern"),
      lines: rawArg(args, "config_lines")
        .split("\n")
        .map((l) => l.trim())
        .filter(Boolean)
        .map((l) => sanitize("text", "config_lines", l)),
      commit: isBlank(args, "commit") ? true : flagArg(args, "commit"),
      checkMode: flagArg(args, "check_mode"),
    }),
    execute: ({ workspace, signal }, req) => workspace.devices.pushConfig({ ...req, signal }),
    render: (report, req) => engineReply(report, req.checkMode ? "=== DRY RUN ===" : undefined),
  }),
];
