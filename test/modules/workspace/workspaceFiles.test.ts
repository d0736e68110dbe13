import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { InvalidArgument, NotFound, PathViolation } from "../../../src/errors.js";
import { DEFAULT_ENGINE_CONFIG } from "../../../src/modules/workspace/layout.js";
import type { Workspace } from "../../../src/workspace.js";
import { FIXED_NOW, FIXED_STAMP, createTestWorkspace, readText, writeFiles } from "../../test-utils.js";

describe("workspace/workspaceFiles", () => {
  let ws: Workspace;
  let root: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ workspace: ws, root, cleanup } = await createTestWorkspace({ now: () => FIXED_NOW }));
  });

  afterEach(async () => {
    await cleanup();
  });

  it("initialises the standard layout once", async () => {
    const first = await ws.workspaceFiles.init();
    expect(first.created).toEqual([
      "inventory/",
      "group_vars/",
      "host_vars/",
      "playbooks/",
      "roles/",
      "templates/",
      "files/",
      "inventory/hosts.ini",
      "ansible.cfg",
    ]);
    expect(await readText(root, "ansible.cfg")).toBe(DEFAULT_ENGINE_CONFIG);
    expect(await readText(root, "inventory/hosts.ini")).toBe("");

    const second = await ws.workspaceFiles.init();
    expect(second.created).toEqual([]);
    expect(second.existing).toHaveLength(9);
  });

  it("lists the tree without hidden files and backups", async () => {
    await writeFiles(root, {
      "inventory/hosts.ini": "[web]\n",
      [`inventory/hosts.ini.${FIXED_STAMP}.bak`]: "old",
      ".git/HEAD": "ref",
      "ansible.cfg": "abc",
    });
    expect(await ws.workspaceFiles.structure()).toEqual([
      { path: "ansible.cfg", depth: 0, kind: "file", size: 3 },
      { path: "inventory", depth: 0, kind: "dir", size: 0 },
      { path: "inventory/hosts.ini", depth: 1, kind: "file", size: 6 },
    ]);
  });

  it("reads files and lists directories", async () => {
    await writeFiles(root, { "group_vars/all.yml": "x: 1\n", "group_vars/web.yml": "y: 2\n" });
    expect(await ws.workspaceFiles.readFile("group_vars/all.yml")).toEqual({
      kind: "file",
      path: "group_vars/all.yml",
      content: "x: 1\n",
    });
    expect(await ws.workspaceFiles.readFile("group_vars")).toEqual({
      kind: "dir",
      path: "group_vars",
      entries: ["all.yml", "web.yml"],
    });
    await expect(ws.workspaceFiles.readFile("group_vars/none.yml")).rejects.toBeInstanceOf(NotFound);
    await expect(ws.workspaceFiles.readFile("../outside")).rejects.toBeInstanceOf(PathViolation);
  });

  it("writes nested files and refuses to replace a directory", async () => {
    const out = await ws.workspaceFiles.writeFile("roles/base/tasks/main.yml", "- debug: msg=hi\n");
    expect(out.created).toBe(true);
    expect(await readText(root, "roles/base/tasks/main.yml")).toBe("- debug: msg=hi\n");
    await expect(ws.workspaceFiles.writeFile("roles", "x")).rejects.toBeInstanceOf(InvalidArgument);
  });

  it("lists and restores backups", async () => {
    await ws.workspaceFiles.writeFile("ansible.cfg", "v1");
    await ws.workspaceFiles.writeFile("ansible.cfg", "v2");

    const listed = await ws.workspaceFiles.listBackups("ansible.cfg");
    expect(listed.map((b) => b.backupPath)).toEqual([`ansible.cfg.${FIXED_STAMP}.bak`]);

    const { restored, safety } = await ws.workspaceFiles.restoreBackup(`ansible.cfg.${FIXED_STAMP}.bak`);
    expect(restored.content).toBe("v1");
    expect(safety?.content).toBe("v2");
    expect(await readText(root, "ansible.cfg")).toBe("v1");
    expect(await fs.readdir(root)).toEqual(
      expect.arrayContaining([`ansible.cfg.${FIXED_STAMP}.bak`, `ansible.cfg.${FIXED_STAMP}-1.bak`]),
    );
  });

  it("reports NotFound for backups of a file that never existed", async () => {
    await expect(ws.workspaceFiles.listBackups("playbooks/ghost.yml")).rejects.toBeInstanceOf(NotFound);
    expect(path.isAbsolute(ws.guard.root)).toBe(true);
  });
});
