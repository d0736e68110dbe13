import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { AlreadyExists, BackupFailure, NotFound, PathViolation } from "../../../src/errors.js";
import { noopLog } from "../../../src/logger.js";
import { createPathGuard } from "../../../src/modules/security/pathGuard.js";
import { createBackupManager } from "../../../src/modules/workspace/backupManager.js";
import { createManagedFiles, type ManagedFiles } from "../../../src/modules/workspace/managedFiles.js";
import { FIXED_NOW, FIXED_STAMP, makeTempDir, readText, writeFiles } from "../../test-utils.js";

describe("workspace/managedFiles", () => {
  let dir: string;
  let files: ManagedFiles;

  beforeEach(async () => {
    dir = await makeTempDir();
    const guard = await createPathGuard(dir);
    files = createManagedFiles({ guard, backups: createBackupManager({ guard, log: noopLog, now: () => FIXED_NOW }), log: noopLog });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("creates a new file without a backup and parent directories on the way", async () => {
    const out = await files.write("group_vars/web.yml", "x: 1\n");
    expect(out).toEqual({ path: "group_vars/web.yml", created: true, backup: null });
    expect(await readText(files.guard.root, "group_vars/web.yml")).toBe("x: 1\n");
  });

  it("backs up the previous content before overwriting", async () => {
    await files.write("ansible.cfg", "old");
    const out = await files.write("ansible.cfg", "new");

    expect(out.created).toBe(false);
    expect(out.backup?.content).toBe("old");
    expect(await readText(files.guard.root, `ansible.cfg.${FIXED_STAMP}.bak`)).toBe("old");
    expect(await files.read("ansible.cfg")).toBe("new");
  });

  it("leaves no temp files behind", async () => {
    await files.write("playbooks/site.yml", "- hosts: all\n");
    expect(await fs.readdir(path.join(files.guard.root, "playbooks"))).toEqual(["site.yml"]);
  });

  it("refuses to write backup files", async () => {
    await expect(files.write(`ansible.cfg.${FIXED_STAMP}.bak`, "x")).rejects.toMatchObject({ reason: "backup" });
  });

  it("refuses paths outside the workspace", async () => {
    await expect(files.write("../evil.yml", "x")).rejects.toBeInstanceOf(PathViolation);
    await expect(files.read("/etc/hostname")).rejects.toBeInstanceOf(PathViolation);
  });

  it("does not overwrite when the snapshot fails", async () => {
    await fs.mkdir(path.join(files.guard.root, "inventory"));
    await expect(files.write("inventory", "x")).rejects.toBeInstanceOf(BackupFailure);
    expect((await fs.stat(path.join(files.guard.root, "inventory"))).isDirectory()).toBe(true);
  });

  it("create fails when the file exists", async () => {
    await writeFiles(files.guard.root, { "templates/a.j2": "x" });
    await expect(files.create("templates/a.j2", "y")).rejects.toBeInstanceOf(AlreadyExists);
    expect(await files.create("templates/b.j2", "y")).toEqual({ path: "templates/b.j2", created: true, backup: null });
  });

  it("remove backs up and deletes", async () => {
    await writeFiles(files.guard.root, { "playbooks/old.yml": "- hosts: all\n" });
    const out = await files.remove("playbooks/old.yml");

    expect(out.backup?.content).toBe("- hosts: all\n");
    expect(await files.exists("playbooks/old.yml")).toBe(false);
    await expect(files.remove("playbooks/old.yml")).rejects.toBeInstanceOf(NotFound);
  });

  it("read raises NotFound and readOptional returns null for missing files", async () => {
    await expect(files.read("nope.yml")).rejects.toBeInstanceOf(NotFound);
    expect(await files.readOptional("nope.yml")).toBeNull();
  });
});
