import { renderReport } from "../executors/engine.js";
import type { PlaybookEntry } from "../modules/playbooks/playbookStore.js";
import type { Workspace } from "../workspace.js";
import { flagArg, isBlank, optionalArg, requireConfirm, requiredArg } from "./args.js";
import { defineTool, engineReply, failure, success, warning, type ToolArgs, type ToolDefinition, type ToolReply } from "./types.js";

type Resolved<T> = { kind: "missing"; available: string[] } | { kind: "done"; value: T };

function playbookNameArg(args: ToolArgs): string | null {
  return isBlank(args, "playbook_name") ? null : requiredArg(args, "playbook_name", "name");
}

// a blank name is answered with the playbooks that exist
async function withPlaybook<T>(ws: Workspace, name: string | null, fn: (name: string) => Promise<T>): Promise<Resolved<T>> {
  if (name === null) return { kind: "missing", available: (await ws.playbooks.list()).map((p) => p.name) };
  return { kind: "done", value: await fn(name) };
}

function missingReply(available: readonly string[]): ToolReply {
  return failure(
    available.length ? `No playbook specified. Available:\n- ${available.join("\n- ")}` : "No playbook specified.",
  );
}

function renderList(entries: readonly PlaybookEntry[]): string {
  if (!entries.length) return "No playbooks found in playbooks/\n\nUse ansible_create_playbook to create one.";
  return [
    "=== PLAYBOOKS ===",
    "",
    ...entries.map((p) => (p.description ? `- ${p.name}: ${p.description}` : `- ${p.name}`)),
    "",
    `Total: ${entries.length} playbook(s)`,
  ].join("\n");
}

export const playbookTools: readonly ToolDefinition[] = [
  defineTool({
    name: "ansible_list_playbooks",
    description: "List playbooks in playbooks/ with the description from their first comment line.",
    args: {},
    mutating: false,
    parse: () => null,
    execute: ({ workspace }) => workspace.playbooks.list(),
    render: (entries) => success(renderList(entries)),
  }),

  defineTool({
    name: "ansible_create_playbook",
    description: "Create a playbook in playbooks/ and syntax-check it. Fails when it already exists.",
    args: {
      playbook_name: "Playbook name; .yml is appended when missing",
      content: "Full YAML content",
      description: "Optional one-line description written as a leading comment",
    },
    mutating: true,
    parse: (args) => ({
      name: requiredArg(args, "playbook_name", "name"),
      content: requiredArg(args, "content", "content"),
      description: optionalArg(args, "description", "text"),
    }),
    execute: ({ workspace }, req) => workspace.playbooks.create(req.name, req.content, req.description),
    render: (res) =>
      res.validation.outcome === "failure"
        ? warning(`Playbook created: ${res.path}\nSyntax check failed:\n${renderReport(res.validation)}`)
        : success(`Playbook created: ${res.path}\nSyntax check passed.`),
  }),

  defineTool({
    name: "ansible_read_playbook",
    description: "Read a playbook. Without a name, lists the playbooks.",
    args: { playbook_name: "Playbook name" },
    mutating: false,
    parse: (args) => ({ name: playbookNameArg(args) }),
    execute: ({ workspace }, req) => withPlaybook(workspace, req.name, (n) => workspace.playbooks.read(n)),
    render: (res) =>
      res.kind === "missing"
        ? missingReply(res.available)
        : success(`=== PLAYBOOK: ${res.value.path} ===\n\n${res.value.content}`),
  }),

  defineTool({
    name: "ansible_edit_playbook",
    description: "Replace the content of a playbook (old content is backed up) and syntax-check it.",
    args: { playbook_name: "Playbook name", content: "Full YAML content" },
    mutating: true,
    parse: (args) => ({
      name: requiredArg(args, "playbook_name", "name"),
      content: requiredArg(args, "content", "content"),
    }),
    execute: ({ workspace }, req) => workspace.playbooks.update(req.name, req.content),
    render: (res) => {
      const backup = res.backup ? `\nBackup saved to: ${res.backup.backupPath}` : "";
      return res.validation.outcome === "failure"
        ? warning(`Playbook updated: ${res.path}${backup}\nSyntax check failed:\n${renderReport(res.validation)}`)
        : success(`Playbook updated: ${res.path}${backup}\nSyntax check passed.`);
    },
  }),

  defineTool({
    name: "ansible_delete_playbook",
    description: "Delete a playbook (a backup is kept). Requires confirm=yes.",
    args: { playbook_name: "Playbook name", confirm: "Set to 'yes' to confirm" },
    mutating: true,
    parse: (args) => {
      const name = requiredArg(args, "playbook_name", "name");
      requireConfirm(args, `delete playbook '${name}'`);
      return { name };
    },
    execute: ({ workspace }, req) => workspace.playbooks.delete(req.name),
    render: (res) => success(`Playbook deleted: ${res.path}${res.backup ? `\nBackup saved to: ${res.backup.backupPath}` : ""}`),
  }),

  defineTool({
    name: "ansible_validate_playbook",
    description: "Syntax-check a playbook without running it.",
    args: { playbook_name: "Playbook name" },
    mutating: false,
    parse: (args) => ({ name: playbookNameArg(args) }),
    execute: ({ workspace, signal }, req) =>
      withPlaybook(workspace, req.name, (n) => workspace.playbooks.validate(n, signal)),
    render: (res, req) => {
      if (res.kind === "missing") return missingReply(res.available);
      return res.value.outcome === "failure"
        ? failure(`Syntax errors in '${req.name}':\n${renderReport(res.value)}`)
        : success(`Playbook '${req.name}' syntax is valid.`);
    },
  }),

  defineTool({
    name: "ansible_run_playbook",
    description: "Run a playbook. limit_hosts narrows the targets, extra_vars and tags are passed through.",
    args: {
      playbook_name: "Playbook name",
      limit_hosts: "Hosts or groups to limit the run to",
      extra_vars: "Extra variables, key=value pairs",
      tags: "Comma separated tags",
      verbose: "Set to 'yes' for -vvv output",
    },
    mutating: true,
    parse: (args) => ({
      name: playbookNameArg(args),
      limit: optionalArg(args, "limit_hosts", "pattern"),
      extraVars: optionalArg(args, "extra_vars", "text"),
      tags: optionalArg(args, "tags", "pattern"),
      verbose: flagArg(args, "verbose"),
    }),
    execute: ({ workspace, signal }, req) =>
      withPlaybook(workspace, req.name, (n) =>
        workspace.playbooks.run(n, {
          limit: req.limit,
          extraVars: req.extraVars,
          tags: req.tags,
          verbose: req.verbose,
          signal,
        }),
      ),
    render: (res) => (res.kind === "missing" ? missingReply(res.available) : engineReply(res.value)),
  }),

  defineTool({
    name: "ansible_check_playbook",
    description: "Dry-run a playbook in check mode with diffs; nothing is changed on the targets.",
    args: { playbook_name: "Playbook name", limit_hosts: "Hosts or groups to limit the run to" },
    mutating: false,
    parse: (args) => ({ name: playbookNameArg(args), limit: optionalArg(args, "limit_hosts", "pattern") }),
    execute: ({ workspace, signal }, req) =>
      withPlaybook(workspace, req.name, (n) => workspace.playbooks.check(n, { limit: req.limit, signal })),
    render: (res) =>
      res.kind === "missing" ? missingReply(res.available) : engineReply(res.value, "=== DRY RUN (CHECK MODE) ==="),
  }),
];
