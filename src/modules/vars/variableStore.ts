import fs from "node:fs/promises";

import { HostNotFound, NotFound } from "../../errors.js";
import type { LoggerFn } from "../../logger.js";
import { isMissingError } from "../../utils/validate.js";
import { parseYamlMapping } from "../../utils/yamlDoc.js";
import { hostGroupChain } from "../inventory/inventoryIni.js";
import type { InventoryStore } from "../inventory/inventoryStore.js";
import { isBackupPath } from "../workspace/backupManager.js";
import { LAYOUT, YAML_EXTENSIONS, hasYamlExtension, stripYamlExtension } from "../workspace/layout.js";
import type { ManagedFiles, WriteOutcome } from "../workspace/managedFiles.js";

export type VarScope = "group" | "host";

export type VariableFile = Readonly<{
  scope: VarScope;
  name: string;
  path: string;
  content: string;
}>;

export type VariableFileEntry = Omit<VariableFile, "content">;

export type EffectiveVariables = Readonly<{
  host: string;
  /** lowest precedence first */
  groups: string[];
  vars: Record<string, unknown>;
  /** which layer supplied the winning value of each key */
  sources: Record<string, string>;
}>;

export type VariableStore = {
  read(scope: VarScope, name: string): Promise<VariableFile>;
  write(scope: VarScope, name: string, content: string): Promise<WriteOutcome>;
  list(): Promise<VariableFileEntry[]>;
  effective(host: string): Promise<EffectiveVariables>;
};

function scopeDir(scope: VarScope): string {
  return scope === "group" ? LAYOUT.groupVarsDir : LAYOUT.hostVarsDir;
}

export function createVariableStore(opts: {
  files: ManagedFiles;
  inventory: InventoryStore;
  log: LoggerFn;
}): VariableStore {
  const { files, inventory, log } = opts;

  // first existing of <name>.yml / <name>.yaml
  async function locate(scope: VarScope, name: string): Promise<string | null> {
    const base = stripYamlExtension(name);
    const candidates = hasYamlExtension(name) ? [name] : YAML_EXTENSIONS.map((ext) => `${base}${ext}`);
    for (const file of candidates) {
      const rel = `${scopeDir(scope)}/${file}`;
      if (await files.exists(rel)) return rel;
    }
    return null;
  }

  async function readMapping(scope: VarScope, name: string): Promise<{ path: string; vars: Record<string, unknown> } | null> {
    const rel = await locate(scope, name);
    if (!rel) return null;
    const content = await files.read(rel);
    return { path: rel, vars: parseYamlMapping(content, rel) };
  }

  async function read(scope: VarScope, name: string): Promise<VariableFile> {
    const rel = await locate(scope, name);
    if (!rel) throw new NotFound(`${scope}_vars for '${stripYamlExtension(name)}'`);
    return { scope, name: stripYamlExtension(name), path: rel, content: await files.read(rel) };
  }

  async function write(scope: VarScope, name: string, content: string): Promise<WriteOutcome> {
    const rel =
      (await locate(scope, name)) ?? `${scopeDir(scope)}/${hasYamlExtension(name) ? name : `${name}.yml`}`;
    parseYamlMapping(content, rel);
    const outcome = await files.write(rel, content);
    log("variables written", { scope, name: stripYamlExtension(name) });
    return outcome;
  }

  async function listScope(scope: VarScope): Promise<VariableFileEntry[]> {
    const dir = await files.guard.resolve(scopeDir(scope));
    const names = await fs.readdir(dir).catch((err: unknown) => {
      if (isMissingError(err)) return [];
      throw err;
    });
    return names
      .filter((n) => !n.startsWith(".") && !isBackupPath(n) && hasYamlExtension(n))
      .sort()
      .map((n) => ({ scope, name: stripYamlExtension(n), path: `${scopeDir(scope)}/${n}` }));
  }

  async function list(): Promise<VariableFileEntry[]> {
    return [...(await listScope("group")), ...(await listScope("host"))];
  }

  async function effective(host: string): Promise<EffectiveVariables> {
    const model = await inventory.model();
    const entry = model.hosts.get(host);
    if (!entry) throw new HostNotFound(host);

    const groups = hostGroupChain(model, host);
    const vars: Record<string, unknown> = {};
    const sources: Record<string, string> = {};
    const apply = (layer: Record<string, unknown>, source: string) => {
      for (const [k, v] of Object.entries(layer)) {
        vars[k] = v;
        sources[k] = source;
      }
    };

    for (const g of groups) apply(model.groups.get(g)?.vars ?? {}, `${inventory.path} [${g}:vars]`);
    apply(entry.vars, `${inventory.path} (host line)`);
    for (const g of groups) {
      const file = await readMapping("group", g);
      if (file) apply(file.vars, file.path);
    }
    const hostFile = await readMapping("host", host);
    if (hostFile) apply(hostFile.vars, hostFile.path);

    return { host, groups, vars, sources };
  }

  return { read, write, list, effective };
}
