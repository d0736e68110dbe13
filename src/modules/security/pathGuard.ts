import fs from "node:fs/promises";
import path from "node:path";

import { NotFound, PathViolation } from "../../errors.js";
import { isMissingError } from "../../utils/validate.js";

export type PathGuard = {
  /** Canonical workspace root (symlinks resolved). */
  readonly root: string;
  resolve(relativePath: string): Promise<string>;
  resolveExisting(relativePath: string): Promise<string>;
  toRelative(absolutePath: string): string;
};

/**
 * Validates the textual shape of a workspace-relative path and returns it in
 * posix form. Any ".." segment is refused, even one that normalizes away.
 */
export function normalizeRelativePath(input: string): string {
  const raw = String(input ?? "");
  if (!raw.trim()) throw new PathViolation("empty");
  if (raw.includes("\0")) throw new PathViolation("traversal");

  const unified = raw.trim().replace(/\\/g, "/");
  if (unified.startsWith("/") || /^[A-Za-z]:/.test(unified)) throw new PathViolation("absolute");

  const segments = unified.split("/");
  if (segments.some((s) => s === "..")) throw new PathViolation("traversal");

  const normalized = path.posix.normalize(segments.filter((s) => s && s !== ".").join("/") || ".");
  if (normalized.split("/").some((s) => s === "..")) throw new PathViolation("traversal");
  return normalized;
}

function isWithin(root: string, candidate: string): boolean {
  return candidate === root || candidate.startsWith(root.endsWith(path.sep) ? root : root + path.sep);
}

// realpath of a target that may not exist yet: canonicalize the nearest
// existing ancestor and re-append the missing tail.
async function canonicalize(absolutePath: string): Promise<string> {
  const tail: string[] = [];
  let current = absolutePath;
  for (;;) {
    try {
      const real = await fs.realpath(current);
      return tail.length ? path.join(real, ...tail) : real;
    } catch (err) {
      if (!isMissingError(err)) throw err;
    }

    const stat = await fs.lstat(current).catch((err: unknown) => {
      if (isMissingError(err)) return null;
      throw err;
    });
    // a dangling symlink would be followed by a later write
    if (stat?.isSymbolicLink()) throw new PathViolation("escape");

    const parent = path.dirname(current);
    if (parent === current) throw new PathViolation("escape");
    tail.unshift(path.basename(current));
    current = parent;
  }
}

export async function createPathGuard(rootDir: string): Promise<PathGuard> {
  const root = await fs.realpath(path.resolve(rootDir));

  async function resolve(relativePath: string): Promise<string> {
    const normalized = normalizeRelativePath(relativePath);
    const joined = path.join(root, ...normalized.split("/"));
    const canonical = await canonicalize(joined);
    if (!isWithin(root, canonical)) throw new PathViolation("escape");
    return canonical;
  }

  async function resolveExisting(relativePath: string): Promise<string> {
    const abs = await resolve(relativePath);
    try {
      await fs.stat(abs);
    } catch (err) {
      if (isMissingError(err)) throw new NotFound(normalizeRelativePath(relativePath));
      throw err;
    }
    return abs;
  }

  function toRelative(absolutePath: string): string {
    const rel = path.relative(root, absolutePath);
    return rel ? rel.split(path.sep).join("/") : ".";
  }

  return { root, resolve, resolveExisting, toRelative };
}
