import path from "node:path";

import { InvalidArgument } from "../errors.js";
import type { BackupEntry } from "../modules/workspace/backupManager.js";
import type { TreeEntry } from "../modules/workspace/workspaceFiles.js";
import { requiredArg } from "./args.js";
import { defineTool, success, warning, type ToolDefinition } from "./types.js";

function renderTree(root: string, entries: readonly TreeEntry[]): string {
  const lines = entries.map((e) => {
    const name = path.posix.basename(e.path);
    const indent = "  ".repeat(e.depth);
    return e.kind === "dir" ? `${indent}${name}/` : `${indent}${name} (${e.size} bytes)`;
  });
  return ["=== ANSIBLE DIRECTORY STRUCTURE ===", `Base: ${root}`, "", ...lines].join("\n");
}

function renderBackups(file: string, entries: readonly BackupEntry[]): string {
  if (!entries.length) return `No backups of ${file}.`;
  return [`=== BACKUPS: ${file} ===`, ...entries.map((b) => `- ${b.backupPath} (${b.timestamp}, ${b.size} bytes)`)].join(
    "\n",
  );
}

export const workspaceTools: readonly ToolDefinition[] = [
  defineTool({
    name: "ansible_show_structure",
    description: "Show the Ansible workspace directory tree (hidden files and backups omitted).",
    args: {},
    mutating: false,
    parse: () => null,
    execute: ({ workspace }) => workspace.workspaceFiles.structure(),
    render: (entries) => success(renderTree(".", entries)),
  }),

  defineTool({
    name: "ansible_read_file",
    description:
      "Read a file in the Ansible workspace by relative path, e.g. inventory/hosts.ini or group_vars/all.yml. Directories list their entries.",
    args: { file_path: "Workspace-relative path" },
    mutating: false,
    parse: (args) => ({ file: requiredArg(args, "file_path", "path") }),
    execute: ({ workspace }, req) => workspace.workspaceFiles.readFile(req.file),
    render: (view) =>
      view.kind === "dir"
        ? success(`'${view.path}' is a directory containing:\n${view.entries.map((e) => `  - ${e}`).join("\n")}`)
        : success(`=== FILE: ${view.path} ===\n\n${view.content}`),
  }),

  defineTool({
    name: "ansible_write_file",
    description:
      "Write a file in the Ansible workspace by relative path. Parent directories are created and the previous content is backed up.",
    args: { file_path: "Workspace-relative path", content: "Full file content" },
    mutating: true,
    parse: (args) => ({
      file: requiredArg(args, "file_path", "path"),
      content: requiredArg(args, "content", "content"),
    }),
    execute: ({ workspace }, req) => workspace.workspaceFiles.writeFile(req.file, req.content),
    render: (res) =>
      success(
        res.backup ? `File written to ${res.path}\nBackup saved to: ${res.backup.backupPath}` : `File created: ${res.path}`,
      ),
  }),

  defineTool({
    name: "ansible_list_backups",
    description: "List the timestamped backups of a workspace file, oldest first.",
    args: { file_path: "Workspace-relative path of the original file" },
    mutating: false,
    parse: (args) => ({ file: requiredArg(args, "file_path", "path") }),
    execute: ({ workspace }, req) => workspace.workspaceFiles.listBackups(req.file),
    render: (entries, req) => success(renderBackups(req.file, entries)),
  }),

  defineTool({
    name: "ansible_restore_backup",
    description: "Restore a file from one of its backups. The current content is backed up first.",
    args: { backup_path: "Workspace-relative path of the .bak file" },
    mutating: true,
    parse: (args) => {
      const backupPath = requiredArg(args, "backup_path", "path");
      if (!backupPath.endsWith(".bak")) throw new InvalidArgument("backup_path must name a .bak file");
      return { backupPath };
    },
    execute: ({ workspace }, req) => workspace.workspaceFiles.restoreBackup(req.backupPath),
    render: ({ restored, safety }) =>
      success(
        [
          `Restored ${restored.originalPath} from ${restored.backupPath}`,
          safety ? `Previous content saved to: ${safety.backupPath}` : null,
        ]
          .filter(Boolean)
          .join("\n"),
      ),
  }),

  defineTool({
    name: "ansible_init_workspace",
    description: "Create the standard workspace layout, an empty inventory and a default ansible.cfg where missing.",
    args: {},
    mutating: true,
    parse: () => null,
    execute: ({ workspace }) => workspace.workspaceFiles.init(),
    render: ({ created, existing }) =>
      created.length
        ? success([`Workspace initialised. Created:`, ...created.map((c) => `- ${c}`)].join("\n"))
        : warning(`Workspace already initialised (${existing.length} entries present).`),
  }),
];
