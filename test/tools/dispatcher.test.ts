import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { Dispatcher } from "../../src/tools/dispatcher.js";
import { buildToolTable } from "../../src/tools/toolTable.js";
import { defineTool, success, type ToolArgs, type ToolDefinition } from "../../src/tools/types.js";
import type { Workspace } from "../../src/workspace.js";
import { FIXED_NOW, FIXED_STAMP, createTestWorkspace, writeFiles } from "../test-utils.js";

function deferred<T>() {
  let resolve: (v: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("tools/dispatcher", () => {
  let ws: Workspace;
  let root: string;
  let cleanup: () => Promise<void>;
  let dispatcher: Dispatcher;

  beforeEach(async () => {
    ({ workspace: ws, root, cleanup } = await createTestWorkspace({ now: () => FIXED_NOW }));
    dispatcher = new Dispatcher({ workspace: ws, tools: buildToolTable(), log: () => {} });
  });

  afterEach(async () => {
    await cleanup();
  });

  it("answers unknown tools without echoing odd names", async () => {
    expect(await dispatcher.call("nope")).toBe("ERROR: Unknown tool 'nope'.");
    expect(await dispatcher.call("rm -rf /")).toBe("ERROR: Unknown tool.");
  });

  it("registers every tool once", () => {
    const names = dispatcher.tools.map((t) => t.name);
    expect(new Set(names).size).toBe(names.length);
    expect(names).toEqual(
      expect.arrayContaining([
        "ansible_show_structure",
        "ansible_read_file",
        "ansible_write_file",
        "ansible_add_host",
        "ansible_remove_host",
        "ansible_show_host_vars",
        "ansible_create_playbook",
        "ansible_run_playbook",
        "ansible_check_playbook",
        "ansible_adhoc_command",
        "ansible_push_config",
      ]),
    );
  });

  it("turns rejected input into generic errors", async () => {
    expect(await dispatcher.call("ansible_read_file", { file_path: "../etc/passwd" })).toBe(
      "ERROR: Access denied - path must stay within the Ansible workspace.",
    );
    expect(await dispatcher.call("ansible_read_file", { file_path: "a;rm -rf ~" })).toBe(
      "ERROR: Input rejected: 'file_path' contains characters that are not allowed.",
    );
    expect(await dispatcher.call("ansible_read_file", {})).toBe("ERROR: No file_path given.");
    expect(await dispatcher.call("ansible_read_file", { file_path: 42 })).toBe("ERROR: No file_path given.");
  });

  it("requires confirmation for destructive tools", async () => {
    expect(await dispatcher.call("ansible_remove_host", { hostname: "w1" })).toBe(
      "ERROR: Set confirm=yes to remove host 'w1'.",
    );
  });

  it("refuses shell modules", async () => {
    expect(await dispatcher.call("ansible_adhoc_command", { module_name: "shell", module_args: "id" })).toBe(
      "ERROR: Module 'shell' runs shell commands and is not allowed.",
    );
  });

  it("masks secrets in replies", async () => {
    await writeFiles(root, { "group_vars/all.yml": "ansible_password: hunter2\n" });
    expect(await dispatcher.call("ansible_read_file", { file_path: "group_vars/all.yml" })).toBe(
      "SUCCESS: === FILE: group_vars/all.yml ===\n\nansible_password: ********\n",
    );
  });

  it("adds and removes a host end to end", async () => {
    expect(
      await dispatcher.call("ansible_add_host", { hostname: "web1", ansible_host: "10.0.0.5", group: "web" }),
    ).toBe("SUCCESS: Host 'web1' added to group [web]:\n  web1 ansible_host=10.0.0.5");

    expect(await dispatcher.call("ansible_remove_host", { hostname: "web1", confirm: "yes" })).toBe(
      `SUCCESS: Host 'web1' removed from [web].\nEmpty group section removed: [web]\nBackup saved to: inventory/hosts.ini.${FIXED_STAMP}.bak`,
    );
  });

  it("masks connection and become passwords from inventory and host_vars", async () => {
    await writeFiles(root, {
      "inventory/hosts.ini": "[routers]\nr1 ansible_host=10.0.0.1 ansible_ssh_pass=hunter2 ansible_become_pass=rootpw\n",
      "host_vars/r1.yml": "ansible_ssh_pass: hunter3\nansible_become_pass: rootpw2\n",
    });

    expect(await dispatcher.call("ansible_read_inventory")).toBe(
      "SUCCESS: === INVENTORY: inventory/hosts.ini ===\n\n" +
        "[routers]\nr1 ansible_host=10.0.0.1 ansible_ssh_pass=******** ansible_become_pass=********\n",
    );
    expect(await dispatcher.call("ansible_read_host_vars", { hostname: "r1" })).toBe(
      "SUCCESS: === host_vars/r1.yml ===\n\nansible_ssh_pass: ********\nansible_become_pass: ********\n",
    );

    const shown = await dispatcher.call("ansible_show_host_vars", { hostname: "r1" });
    expect(shown).toContain("ansible_ssh_pass: ********\nansible_become_pass: ********\n\nSources:");
    expect(shown).not.toMatch(/hunter|rootpw/);
  });

  it("keeps extra-vars files inside the workspace", async () => {
    await writeFiles(root, { "playbooks/p1.yml": "- hosts: all\n", "vars/extra.yml": "version: 2\n" });

    expect(await dispatcher.call("ansible_run_playbook", { playbook_name: "p1", extra_vars: "@/etc/passwd" })).toBe(
      "ERROR: Access denied - path must stay within the Ansible workspace.",
    );
    expect(
      await dispatcher.call("ansible_run_playbook", { playbook_name: "p1", extra_vars: "@../outside.yml" }),
    ).toBe("ERROR: Access denied - path must stay within the Ansible workspace.");

    const ran = await dispatcher.call("ansible_run_playbook", { playbook_name: "p1", extra_vars: "@vars/extra.yml" });
    expect(ran.startsWith("SUCCESS: ")).toBe(true);
    expect(ran).toContain(`extra: @${path.join(root, "vars", "extra.yml")}\n`);
  });

  it("creates, lists and checks playbooks", async () => {
    expect(await dispatcher.call("ansible_create_playbook", { playbook_name: "p1", content: "- hosts: all\n" })).toBe(
      "SUCCESS: Playbook created: playbooks/p1.yml\nSyntax check passed.",
    );
    expect(await dispatcher.call("ansible_read_playbook", {})).toBe(
      "ERROR: No playbook specified. Available:\n- p1.yml",
    );

    const checked = await dispatcher.call("ansible_check_playbook", { playbook_name: "p1" });
    expect(checked.startsWith("SUCCESS: === DRY RUN (CHECK MODE) ===\nCompleted successfully.\n\n=== SUMMARY ===\n")).toBe(
      true,
    );
    expect(checked).toContain("mode: check\n");
  });

  describe("with stub tools", () => {
    it("passes only declared arguments, as strings", async () => {
      const seen: ToolArgs[] = [];
      const echo = defineTool({
        name: "echo",
        description: "echo",
        args: { a: "", n: "" },
        mutating: false,
        parse: (args) => {
          seen.push(args);
          return null;
        },
        execute: async () => "ok",
        render: (text) => success(text),
      });
      const d = new Dispatcher({ workspace: ws, tools: new Map([["echo", echo]]), log: () => {} });

      expect(await d.call("echo", { a: "x", n: 5, extra: "y" })).toBe("SUCCESS: ok");
      expect(seen).toEqual([{ a: "x", n: "" }]);
    });

    it("runs calls one at a time and reports its state", async () => {
      const gates = [deferred<string>(), deferred<string>()];
      const order: string[] = [];
      let next = 0;
      const slow: ToolDefinition = defineTool({
        name: "slow",
        description: "slow",
        args: {},
        mutating: true,
        parse: () => next++,
        execute: async (_ctx, i) => {
          order.push(`start ${i}`);
          const text = await gates[i].promise;
          order.push(`end ${i}`);
          return text;
        },
        render: (text) => success(text),
      });
      const d = new Dispatcher({ workspace: ws, tools: new Map([["slow", slow]]), log: () => {} });

      expect(d.state).toBe("idle");
      const first = d.call("slow");
      const second = d.call("slow");
      await vi.waitFor(() => expect(order).toEqual(["start 0"]));
      expect(d.state).toBe("in-flight");

      gates[0].resolve("one");
      await vi.waitFor(() => expect(order).toEqual(["start 0", "end 0", "start 1"]));
      gates[1].resolve("two");

      expect(await first).toBe("SUCCESS: one");
      expect(await second).toBe("SUCCESS: two");
      expect(d.state).toBe("idle");
    });

    it("hides internal errors and logs them", async () => {
      const log = vi.fn();
      const boom = defineTool({
        name: "boom",
        description: "boom",
        args: {},
        mutating: false,
        parse: () => null,
        execute: async (): Promise<string> => {
          throw new Error("disk on fire");
        },
        render: (text) => success(text),
      });
      const d = new Dispatcher({ workspace: ws, tools: new Map([["boom", boom]]), log });

      expect(await d.call("boom")).toBe("ERROR: Internal error while handling the request.");
      expect(log).toHaveBeenCalledWith("tool call failed", { tool: "boom", code: "INTERNAL", err: "disk on fire" });
      expect(log).toHaveBeenCalledWith("tool call", expect.objectContaining({ tool: "boom", status: "ERROR" }));
    });
  });
});
