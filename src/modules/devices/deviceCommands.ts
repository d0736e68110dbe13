import type { WorkspaceConfig } from "../../config.js";
import { InvalidArgument } from "../../errors.js";
import type { CommandRunner } from "../../executors/commandRunner.js";
import { assertSucceeded, buildAdhocArgv, reportExecution, type EngineReport } from "../../executors/engine.js";
import type { LoggerFn } from "../../logger.js";
import { LAYOUT } from "../workspace/layout.js";

const JUNOS_COMMAND = "junipernetworks.junos.junos_command";
const JUNOS_CONFIG = "junipernetworks.junos.junos_config";
const JUNOS_FACTS = "junipernetworks.junos.junos_facts";

const SHELL_MODULES = ["shell", "command", "raw", "script", "expect", "telnet"] as const;

export const CONFIG_DISPLAY_FORMATS = ["text", "set", "json", "xml"] as const;

export type ConfigDisplayFormat = (typeof CONFIG_DISPLAY_FORMATS)[number];

export function isShellModule(module: string): boolean {
  const short = module.replace(/^ansible\.(?:builtin|legacy)\./, "");
  return SHELL_MODULES.some((m) => m === short);
}

export type PingReport = EngineReport & Readonly<{ reachable: number; failed: number }>;

/** `host | STATUS` lines of ad-hoc output. */
export function countHostStatuses(stdout: string): { reachable: number; failed: number } {
  let reachable = 0;
  let failed = 0;
  for (const line of stdout.split("\n")) {
    const m = /^\S+\s+\|\s+(SUCCESS|CHANGED|FAILED!?|UNREACHABLE!?)/.exec(line);
    if (!m) continue;
    if (m[1] === "SUCCESS" || m[1] === "CHANGED") reachable += 1;
    else failed += 1;
  }
  return { reachable, failed };
}

export type DeviceCommands = {
  adhoc(input: { module: string; args?: string | null; target: string; signal?: AbortSignal }): Promise<EngineReport>;
  ping(target: string, signal?: AbortSignal): Promise<PingReport>;
  facts(target: string, subset?: string | null, signal?: AbortSignal): Promise<string>;
  runningConfig(target: string, format: ConfigDisplayFormat, signal?: AbortSignal): Promise<string>;
  runCommands(target: string, commands: readonly string[], signal?: AbortSignal): Promise<string>;
  pushConfig(input: {
    target: string;
    lines: readonly string[];
    commit: boolean;
    checkMode: boolean;
    signal?: AbortSignal;
  }): Promise<EngineReport>;
};

export function createDeviceCommands(opts: {
  runner: CommandRunner;
  config: WorkspaceConfig;
  log: LoggerFn;
}): DeviceCommands {
  const { runner, config, log } = opts;

  async function runModule(a: {
    target: string;
    module: string;
    args?: string | null;
    check?: boolean;
    timeoutMs: number;
    signal?: AbortSignal;
  }) {
    const argv = buildAdhocArgv(config.engine, {
      inventory: LAYOUT.inventory,
      target: a.target,
      module: a.module,
      args: a.args,
      check: a.check,
    });
    const result = await runner.run(argv, { timeoutMs: a.timeoutMs, captureMode: "separate", signal: a.signal });
    log("device module executed", { module: a.module, target: a.target, exitCode: result.exitCode });
    return result;
  }

  return {
    async adhoc({ module, args, target, signal }) {
      if (isShellModule(module)) throw new InvalidArgument(`module '${module}' runs shell commands and is not allowed`);
      const timeoutMs = config.timeouts.runMs;
      return reportExecution(await runModule({ target, module, args, timeoutMs, signal }), timeoutMs);
    },

    async ping(target, signal) {
      const timeoutMs = config.timeouts.deviceMs;
      const result = await runModule({ target, module: "ping", timeoutMs, signal });
      return { ...reportExecution(result, timeoutMs), ...countHostStatuses(result.stdout) };
    },

    async facts(target, subset, signal) {
      const timeoutMs = config.timeouts.deviceMs;
      const args = subset ? `gather_subset=${subset}` : null;
      return assertSucceeded(await runModule({ target, module: JUNOS_FACTS, args, timeoutMs, signal }), timeoutMs)
        .maskedOutput;
    },

    async runningConfig(target, format, signal) {
      const timeoutMs = config.timeouts.deviceMs;
      const args = `display=${format}`;
      return assertSucceeded(await runModule({ target, module: JUNOS_CONFIG, args, timeoutMs, signal }), timeoutMs)
        .maskedOutput;
    },

    async runCommands(target, commands, signal) {
      if (!commands.length) throw new InvalidArgument("no commands given");
      const timeoutMs = config.timeouts.deviceMs;
      const args = `commands=${JSON.stringify(commands)}`;
      return assertSucceeded(await runModule({ target, module: JUNOS_COMMAND, args, timeoutMs, signal }), timeoutMs)
        .maskedOutput;
    },

    async pushConfig({ target, lines, commit, checkMode, signal }) {
      if (!lines.length) throw new InvalidArgument("no configuration lines given");
      const timeoutMs = config.timeouts.deviceMs;
      const args = `lines=${JSON.stringify(lines)} update=merge commit=${commit ? "yes" : "no"}`;
      const result = await runModule({ target, module: JUNOS_CONFIG, args, check: checkMode, timeoutMs, signal });
      return reportExecution(result, timeoutMs);
    },
  };
}
