import fs from "node:fs/promises";

import { AlreadyExists, NotFound, PathViolation } from "../../errors.js";
import type { LoggerFn } from "../../logger.js";
import { isMissingError } from "../../utils/validate.js";
import type { PathGuard } from "../security/pathGuard.js";
import { writeFileAtomic } from "./atomicWrite.js";
import { isBackupPath, type Backup, type BackupManager } from "./backupManager.js";

export type WriteOutcome = Readonly<{
  path: string;
  created: boolean;
  backup: Backup | null;
}>;

export type RemoveOutcome = Readonly<{
  path: string;
  backup: Backup | null;
}>;

/**
 * The one way workspace files are read and mutated. Every overwrite or delete
 * is preceded by a durable snapshot; if the snapshot fails the mutation does
 * not happen.
 */
export type ManagedFiles = {
  readonly guard: PathGuard;
  readonly backups: BackupManager;
  read(relativePath: string): Promise<string>;
  readOptional(relativePath: string): Promise<string | null>;
  exists(relativePath: string): Promise<boolean>;
  write(relativePath: string, content: string): Promise<WriteOutcome>;
  create(relativePath: string, content: string): Promise<WriteOutcome>;
  remove(relativePath: string): Promise<RemoveOutcome>;
};

export function createManagedFiles(opts: {
  guard: PathGuard;
  backups: BackupManager;
  log: LoggerFn;
}): ManagedFiles {
  const { guard, backups, log } = opts;

  async function resolveWritable(relativePath: string): Promise<string> {
    const abs = await guard.resolve(relativePath);
    if (isBackupPath(abs)) throw new PathViolation("backup");
    return abs;
  }

  async function readOptional(relativePath: string): Promise<string | null> {
    const abs = await guard.resolve(relativePath);
    try {
      return await fs.readFile(abs, "utf8");
    } catch (err) {
      if (isMissingError(err)) return null;
      throw err;
    }
  }

  async function read(relativePath: string): Promise<string> {
    const content = await readOptional(relativePath);
    if (content === null) throw new NotFound(guard.toRelative(await guard.resolve(relativePath)));
    return content;
  }

  async function exists(relativePath: string): Promise<boolean> {
    const abs = await guard.resolve(relativePath);
    try {
      await fs.stat(abs);
      return true;
    } catch (err) {
      if (isMissingError(err)) return false;
      throw err;
    }
  }

  async function write(relativePath: string, content: string): Promise<WriteOutcome> {
    const abs = await resolveWritable(relativePath);
    const backup = await backups.snapshot(relativePath);
    await writeFileAtomic(abs, content);
    const rel = guard.toRelative(abs);
    log("file written", { file: rel, backup: backup?.backupPath ?? null });
    return { path: rel, created: backup === null, backup };
  }

  async function create(relativePath: string, content: string): Promise<WriteOutcome> {
    const abs = await resolveWritable(relativePath);
    if (await exists(relativePath)) throw new AlreadyExists(guard.toRelative(abs));
    await writeFileAtomic(abs, content);
    const rel = guard.toRelative(abs);
    log("file created", { file: rel });
    return { path: rel, created: true, backup: null };
  }

  async function remove(relativePath: string): Promise<RemoveOutcome> {
    const abs = await resolveWritable(relativePath);
    const rel = guard.toRelative(abs);
    if (!(await exists(relativePath))) throw new NotFound(rel);
    const backup = await backups.snapshot(relativePath);
    await fs.rm(abs);
    log("file removed", { file: rel, backup: backup?.backupPath ?? null });
    return { path: rel, backup };
  }

  return { guard, backups, read, readOptional, exists, write, create, remove };
}
