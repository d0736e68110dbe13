import fs from "node:fs/promises";

import type { WorkspaceConfig } from "../../config.js";
import { AlreadyExists, NotFound } from "../../errors.js";
import type { CommandRunner } from "../../executors/commandRunner.js";
import { buildPlaybookArgv, reportExecution, type EngineReport, type PlaybookMode } from "../../executors/engine.js";
import type { LoggerFn } from "../../logger.js";
import { isMissingError } from "../../utils/validate.js";
import { isBackupPath } from "../workspace/backupManager.js";
import { LAYOUT, hasYamlExtension } from "../workspace/layout.js";
import type { ManagedFiles, RemoveOutcome, WriteOutcome } from "../workspace/managedFiles.js";

export type PlaybookEntry = Readonly<{
  name: string;
  path: string;
  description: string;
}>;

export type Playbook = PlaybookEntry & Readonly<{ content: string }>;

export type RunPlaybookOptions = {
  limit?: string | null;
  tags?: string | null;
  extraVars?: string | null;
  verbose?: boolean;
  signal?: AbortSignal;
};

export type PlaybookStore = {
  list(): Promise<PlaybookEntry[]>;
  create(name: string, content: string, description?: string | null): Promise<WriteOutcome & { validation: EngineReport }>;
  read(name: string): Promise<Playbook>;
  update(name: string, content: string): Promise<WriteOutcome & { validation: EngineReport }>;
  delete(name: string): Promise<RemoveOutcome>;
  validate(name: string, signal?: AbortSignal): Promise<EngineReport>;
  run(name: string, opts?: RunPlaybookOptions): Promise<EngineReport>;
  check(name: string, opts?: RunPlaybookOptions): Promise<EngineReport>;
};

export function playbookFileName(name: string): string {
  return hasYamlExtension(name) ? name : `${name}.yml`;
}

/** Text of a leading `# ...` line, or "". */
export function playbookDescription(content: string): string {
  const first = content.split("\n", 1)[0]?.trim() ?? "";
  return first.startsWith("#") ? first.slice(1).trim() : "";
}

export function createPlaybookStore(opts: {
  files: ManagedFiles;
  runner: CommandRunner;
  config: WorkspaceConfig;
  log: LoggerFn;
}): PlaybookStore {
  const { files, runner, config, log } = opts;

  // playbooks/<file> first, then a root-level <file>
  async function locate(name: string): Promise<string> {
    const file = playbookFileName(name);
    for (const rel of [`${LAYOUT.playbooksDir}/${file}`, file]) {
      if (await files.exists(rel)) return rel;
    }
    throw new NotFound(`playbook '${file}'`);
  }

  // a leading `@` makes the engine load a variables file, which must resolve inside the workspace
  async function resolveExtraVars(extraVars: string | null | undefined): Promise<string | null> {
    if (!extraVars) return null;
    if (!extraVars.startsWith("@")) return extraVars;
    return `@${await files.guard.resolveExisting(extraVars.slice(1))}`;
  }

  async function execute(
    name: string,
    mode: PlaybookMode,
    runOpts: RunPlaybookOptions = {},
  ): Promise<EngineReport> {
    const rel = await locate(name);
    const timeoutMs = mode === "syntax" ? config.timeouts.syntaxCheckMs : config.timeouts.runMs;
    const argv = buildPlaybookArgv(config.engine, {
      inventory: LAYOUT.inventory,
      playbook: rel,
      mode,
      limit: runOpts.limit,
      tags: runOpts.tags,
      extraVars: await resolveExtraVars(runOpts.extraVars),
      verbose: runOpts.verbose,
    });
    const result = await runner.run(argv, { timeoutMs, captureMode: "separate", signal: runOpts.signal });
    const report = reportExecution(result, timeoutMs);
    log("playbook executed", { playbook: rel, mode, outcome: report.outcome, exitCode: report.exitCode });
    return report;
  }

  async function list(): Promise<PlaybookEntry[]> {
    const dir = await files.guard.resolve(LAYOUT.playbooksDir);
    const names = await fs.readdir(dir).catch((err: unknown) => {
      if (isMissingError(err)) return [];
      throw err;
    });

    const entries: PlaybookEntry[] = [];
    for (const n of names.filter((n) => !n.startsWith(".") && !isBackupPath(n) && hasYamlExtension(n)).sort()) {
      const rel = `${LAYOUT.playbooksDir}/${n}`;
      const content = (await files.readOptional(rel)) ?? "";
      entries.push({ name: n, path: rel, description: playbookDescription(content) });
    }
    return entries;
  }

  async function create(name: string, content: string, description?: string | null) {
    const file = playbookFileName(name);
    if (await files.exists(file)) throw new AlreadyExists(`playbook '${file}'`);

    const body = description ? `# ${description}\n${content}` : content;
    const outcome = await files.create(`${LAYOUT.playbooksDir}/${file}`, body);
    return { ...outcome, validation: await execute(file, "syntax") };
  }

  async function read(name: string): Promise<Playbook> {
    const rel = await locate(name);
    const content = await files.read(rel);
    return { name: playbookFileName(name), path: rel, description: playbookDescription(content), content };
  }

  async function update(name: string, content: string) {
    const rel = await locate(name);
    const outcome = await files.write(rel, content);
    return { ...outcome, validation: await execute(name, "syntax") };
  }

  async function remove(name: string): Promise<RemoveOutcome> {
    return await files.remove(await locate(name));
  }

  return {
    list,
    create,
    read,
    update,
    delete: remove,
    validate: (name, signal) => execute(name, "syntax", { signal }),
    run: (name, runOpts) => execute(name, "run", runOpts),
    check: (name, runOpts) => execute(name, "check", runOpts),
  };
}
