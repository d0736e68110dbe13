import { DuplicateHost, HostNotFound, InvalidArgument } from "../../errors.js";
import type { LoggerFn } from "../../logger.js";
import type { Backup } from "../workspace/backupManager.js";
import { LAYOUT } from "../workspace/layout.js";
import type { ManagedFiles, WriteOutcome } from "../workspace/managedFiles.js";
import {
  deleteHostLines,
  insertHostLine,
  parseAssignment,
  parseInventory,
  tokenizeLine,
  type InventoryModel,
} from "./inventoryIni.js";

export type AddHostInput = {
  host: string;
  address: string;
  group: string;
  /** `key=value` pairs separated by whitespace */
  extraVars?: string | null;
};

export type HostChange = Readonly<{
  host: string;
  groups: string[];
  backup: Backup | null;
}>;

export type InventoryListing = Readonly<{
  groups: Array<{ name: string; hosts: string[]; children: string[] }>;
  hosts: Array<{ name: string; groups: string[]; vars: Record<string, string> }>;
}>;

export type InventoryStore = {
  readonly path: string;
  read(): Promise<string>;
  model(): Promise<InventoryModel>;
  write(content: string): Promise<WriteOutcome>;
  addHost(input: AddHostInput): Promise<HostChange & { line: string }>;
  removeHost(host: string): Promise<HostChange & { droppedGroups: string[] }>;
  list(): Promise<InventoryListing>;
};

export function createInventoryStore(opts: { files: ManagedFiles; log: LoggerFn }): InventoryStore {
  const { files, log } = opts;
  const inventoryPath = LAYOUT.inventory;

  async function current(): Promise<string> {
    return (await files.readOptional(inventoryPath)) ?? "";
  }

  async function model(): Promise<InventoryModel> {
    return parseInventory(await current());
  }

  async function write(content: string): Promise<WriteOutcome> {
    parseInventory(content);
    return await files.write(inventoryPath, content);
  }

  async function addHost(input: AddHostInput): Promise<HostChange & { line: string }> {
    const text = await current();
    const parsed = parseInventory(text);
    if (parsed.hosts.has(input.host)) throw new DuplicateHost(input.host);

    const extra = tokenizeLine(String(input.extraVars ?? ""));
    if (extra === null || extra.some((t) => parseAssignment(t) === null)) {
      throw new InvalidArgument("extra_vars must be key=value pairs separated by spaces");
    }

    const line = [input.host, `ansible_host=${input.address}`, ...extra].join(" ");
    const next = insertHostLine(text, input.group, line);
    parseInventory(next);

    const outcome = await files.write(inventoryPath, next);
    log("inventory host added", { host: input.host, group: input.group });
    return { host: input.host, groups: [input.group], line, backup: outcome.backup };
  }

  async function removeHost(host: string): Promise<HostChange & { droppedGroups: string[] }> {
    const text = await current();
    const entry = parseInventory(text).hosts.get(host);
    if (!entry) throw new HostNotFound(host);

    const { text: next, droppedGroups } = deleteHostLines(text, host);
    const outcome = await files.write(inventoryPath, next);
    log("inventory host removed", { host, droppedGroups });
    return { host, groups: [...entry.groups], droppedGroups, backup: outcome.backup };
  }

  async function list(): Promise<InventoryListing> {
    const m = await model();
    return {
      groups: [...m.groups.values()]
        .filter((g) => g.name !== "all" && (g.name !== "ungrouped" || g.hosts.length > 0))
        .map((g) => ({ name: g.name, hosts: [...g.hosts], children: [...g.children] })),
      hosts: [...m.hosts.values()].map((h) => ({ name: h.name, groups: [...h.groups], vars: { ...h.vars } })),
    };
  }

  return {
    path: inventoryPath,
    read: () => files.read(inventoryPath),
    model,
    write,
    addHost,
    removeHost,
    list,
  };
}
