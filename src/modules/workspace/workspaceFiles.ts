import fs from "node:fs/promises";
import path from "node:path";

import { InvalidArgument, NotFound } from "../../errors.js";
import type { LoggerFn } from "../../logger.js";
import { isMissingError } from "../../utils/validate.js";
import { isBackupPath, type Backup, type BackupEntry } from "./backupManager.js";
import { DEFAULT_ENGINE_CONFIG, LAYOUT, WORKSPACE_DIRS } from "./layout.js";
import type { ManagedFiles, WriteOutcome } from "./managedFiles.js";

export type TreeEntry = Readonly<{
  /** workspace-relative posix path */
  path: string;
  depth: number;
  kind: "dir" | "file";
  size: number;
}>;

export type FileView =
  | Readonly<{ kind: "file"; path: string; content: string }>
  | Readonly<{ kind: "dir"; path: string; entries: string[] }>;

export type InitReport = Readonly<{ created: string[]; existing: string[] }>;

export type WorkspaceFiles = {
  structure(): Promise<TreeEntry[]>;
  readFile(relativePath: string): Promise<FileView>;
  writeFile(relativePath: string, content: string): Promise<WriteOutcome>;
  listBackups(relativePath: string): Promise<BackupEntry[]>;
  restoreBackup(backupPath: string): Promise<{ restored: Backup; safety: Backup | null }>;
  init(): Promise<InitReport>;
};

const MAX_TREE_DEPTH = 8;

export function createWorkspaceFiles(opts: { files: ManagedFiles; log: LoggerFn }): WorkspaceFiles {
  const { files, log } = opts;
  const { guard, backups } = files;

  async function walk(abs: string, depth: number, out: TreeEntry[]): Promise<void> {
    if (depth > MAX_TREE_DEPTH) return;
    const dirents = await fs.readdir(abs, { withFileTypes: true });
    dirents.sort((a, b) => a.name.localeCompare(b.name));
    for (const d of dirents) {
      if (d.name.startsWith(".") || isBackupPath(d.name)) continue;
      if (d.isSymbolicLink()) continue;
      const child = path.join(abs, d.name);
      if (d.isDirectory()) {
        out.push({ path: guard.toRelative(child), depth, kind: "dir", size: 0 });
        await walk(child, depth + 1, out);
      } else if (d.isFile()) {
        const stat = await fs.stat(child);
        out.push({ path: guard.toRelative(child), depth, kind: "file", size: stat.size });
      }
    }
  }

  async function structure(): Promise<TreeEntry[]> {
    const out: TreeEntry[] = [];
    await walk(guard.root, 0, out);
    return out;
  }

  async function readFile(relativePath: string): Promise<FileView> {
    const abs = await guard.resolveExisting(relativePath);
    const rel = guard.toRelative(abs);
    const stat = await fs.stat(abs);
    if (stat.isDirectory()) {
      const entries = (await fs.readdir(abs)).sort();
      return { kind: "dir", path: rel, entries };
    }
    return { kind: "file", path: rel, content: await files.read(rel) };
  }

  async function writeFile(relativePath: string, content: string): Promise<WriteOutcome> {
    const abs = await guard.resolve(relativePath);
    const stat = await fs.stat(abs).catch((err: unknown) => {
      if (isMissingError(err)) return null;
      throw err;
    });
    if (stat?.isDirectory()) throw new InvalidArgument("target is a directory");
    return await files.write(relativePath, content);
  }

  async function restoreBackup(backupPath: string) {
    const restored = await backups.load(backupPath);
    const safety = await backups.restore(restored);
    return { restored, safety };
  }

  async function listBackups(relativePath: string): Promise<BackupEntry[]> {
    const entries = await backups.list(relativePath);
    if (!entries.length && !(await files.exists(relativePath))) throw new NotFound(relativePath);
    return entries;
  }

  async function init(): Promise<InitReport> {
    const created: string[] = [];
    const existing: string[] = [];

    for (const dir of WORKSPACE_DIRS) {
      if (await files.exists(dir)) {
        existing.push(`${dir}/`);
        continue;
      }
      await fs.mkdir(await guard.resolve(dir), { recursive: true });
      created.push(`${dir}/`);
    }

    const seeds: Array<[string, string]> = [
      [LAYOUT.inventory, ""],
      [LAYOUT.engineConfig, DEFAULT_ENGINE_CONFIG],
    ];
    for (const [rel, content] of seeds) {
      if (await files.exists(rel)) {
        existing.push(rel);
        continue;
      }
      await files.create(rel, content);
      created.push(rel);
    }

    log("workspace initialised", { created: created.length });
    return { created, existing };
  }

  return { structure, readFile, writeFile, listBackups, restoreBackup, init };
}
