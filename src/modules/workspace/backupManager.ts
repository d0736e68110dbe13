import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";

import { BackupFailure, InvalidArgument } from "../../errors.js";
import type { LoggerFn } from "../../logger.js";
import { isErrnoException, isMissingError } from "../../utils/validate.js";
import type { PathGuard } from "../security/pathGuard.js";
import { writeFileAtomic } from "./atomicWrite.js";

export type Backup = Readonly<{
  /** workspace-relative path of the file that was snapshotted */
  originalPath: string;
  /** workspace-relative path of the `.bak` sibling */
  backupPath: string;
  /** ISO-8601 time the snapshot was taken */
  timestamp: string;
  content: string;
}>;

export type BackupEntry = Readonly<{
  originalPath: string;
  backupPath: string;
  timestamp: string;
  size: number;
}>;

export type BackupManager = {
  snapshot(relativePath: string): Promise<Backup | null>;
  list(relativePath: string): Promise<BackupEntry[]>;
  load(backupPath: string): Promise<Backup>;
  restore(backup: Backup): Promise<Backup | null>;
};

const BACKUP_NAME_RE = /^(.+)\.(\d{8}T\d{9}Z)(?:-(\d+))?\.bak$/;
const MAX_SAME_STAMP = 1000;

export function formatBackupStamp(d: Date): string {
  return d.toISOString().replace(/[-:.]/g, "");
}

function stampToIso(stamp: string): string {
  const m = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(\d{3})Z$/.exec(stamp);
  if (!m) return stamp;
  return `${m[1]}-${m[2]}-${m[3]}T${m[4]}:${m[5]}:${m[6]}.${m[7]}Z`;
}

export function parseBackupName(fileName: string): { original: string; stamp: string; seq: number } | null {
  const m = BACKUP_NAME_RE.exec(fileName);
  if (!m) return null;
  return { original: m[1], stamp: m[2], seq: m[3] ? Number(m[3]) : 0 };
}

export function isBackupPath(p: string): boolean {
  return p.toLowerCase().endsWith(".bak");
}

function siblingPath(relativePath: string, fileName: string): string {
  const dir = path.posix.dirname(relativePath);
  return dir === "." ? fileName : `${dir}/${fileName}`;
}

export function createBackupManager(opts: {
  guard: PathGuard;
  log: LoggerFn;
  now?: () => Date;
}): BackupManager {
  const { guard, log } = opts;
  const now = opts.now ?? (() => new Date());

  async function writeExclusive(dir: string, baseName: string, stamp: string, content: string): Promise<string> {
    for (let seq = 0; seq < MAX_SAME_STAMP; seq++) {
      const fileName = seq === 0 ? `${baseName}.${stamp}.bak` : `${baseName}.${stamp}-${seq}.bak`;
      const target = path.join(dir, fileName);
      let handle: FileHandle;
      try {
        handle = await fs.open(target, "wx");
      } catch (err) {
        if (isErrnoException(err) && err.code === "EEXIST") continue;
        throw err;
      }
      try {
        await handle.writeFile(content, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      return target;
    }
    throw new Error(`too many backups for stamp ${stamp}`);
  }

  async function snapshot(relativePath: string): Promise<Backup | null> {
    const abs = await guard.resolve(relativePath);
    const rel = guard.toRelative(abs);

    let content: string;
    try {
      content = await fs.readFile(abs, "utf8");
    } catch (err) {
      if (isMissingError(err)) return null;
      throw new BackupFailure(rel, err);
    }

    const taken = now();
    let backupAbs: string;
    try {
      backupAbs = await writeExclusive(path.dirname(abs), path.basename(abs), formatBackupStamp(taken), content);
    } catch (err) {
      throw new BackupFailure(rel, err);
    }

    const backup: Backup = {
      originalPath: rel,
      backupPath: guard.toRelative(backupAbs),
      timestamp: taken.toISOString(),
      content,
    };
    log("backup written", { file: backup.originalPath, backup: backup.backupPath });
    return backup;
  }

  async function list(relativePath: string): Promise<BackupEntry[]> {
    const abs = await guard.resolve(relativePath);
    const rel = guard.toRelative(abs);
    const dir = path.dirname(abs);
    const baseName = path.basename(abs);

    const names = await fs.readdir(dir).catch((err: unknown) => {
      if (isMissingError(err)) return [];
      throw err;
    });

    const entries: Array<BackupEntry & { seq: number; stamp: string }> = [];
    for (const name of names) {
      const parsed = parseBackupName(name);
      if (!parsed || parsed.original !== baseName) continue;
      const stat = await fs.stat(path.join(dir, name));
      entries.push({
        originalPath: rel,
        backupPath: siblingPath(rel, name),
        timestamp: stampToIso(parsed.stamp),
        size: stat.size,
        seq: parsed.seq,
        stamp: parsed.stamp,
      });
    }

    entries.sort((a, b) => (a.stamp === b.stamp ? a.seq - b.seq : a.stamp < b.stamp ? -1 : 1));
    return entries.map(({ originalPath, backupPath, timestamp, size }) => ({ originalPath, backupPath, timestamp, size }));
  }

  async function load(backupPath: string): Promise<Backup> {
    const abs = await guard.resolveExisting(backupPath);
    const rel = guard.toRelative(abs);
    const parsed = parseBackupName(path.basename(abs));
    if (!parsed) throw new InvalidArgument("not a backup file");

    const content = await fs.readFile(abs, "utf8");
    return {
      originalPath: siblingPath(rel, parsed.original),
      backupPath: rel,
      timestamp: stampToIso(parsed.stamp),
      content,
    };
  }

  async function restore(backup: Backup): Promise<Backup | null> {
    const abs = await guard.resolve(backup.originalPath);
    const safety = await snapshot(backup.originalPath);
    await writeFileAtomic(abs, backup.content);
    log("backup restored", { file: backup.originalPath, from: backup.backupPath });
    return safety;
  }

  return { snapshot, list, load, restore };
}
