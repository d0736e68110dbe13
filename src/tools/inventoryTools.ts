import type { InventoryListing } from "../modules/inventory/inventoryStore.js";
import { flagArg, optionalArg, requireConfirm, requiredArg } from "./args.js";
import { defineTool, success, type ToolDefinition } from "./types.js";

function renderListing(listing: InventoryListing, showVars: boolean): string {
  const out = ["=== INVENTORY ===", "", `Total Hosts: ${listing.hosts.length}`];
  if (listing.hosts.length) out.push(`Hosts: ${listing.hosts.map((h) => h.name).join(", ")}`);

  if (listing.groups.length) {
    out.push("", `Groups (${listing.groups.length}):`);
    for (const g of listing.groups) {
      const members = [...g.hosts, ...g.children.map((c) => `@${c}`)];
      out.push(`  [${g.name}]: ${members.join(", ")}`);
    }
  }

  if (showVars) {
    const withVars = listing.hosts.filter((h) => Object.keys(h.vars).length);
    if (withVars.length) {
      out.push("", "Host variables:");
      for (const h of withVars) {
        out.push(`  ${h.name}: ${Object.entries(h.vars).map(([k, v]) => `${k}=${v}`).join(" ")}`);
      }
    }
  }
  return out.join("\n");
}

export const inventoryTools: readonly ToolDefinition[] = [
  defineTool({
    name: "ansible_read_inventory",
    description: "Read the inventory file (inventory/hosts.ini).",
    args: {},
    mutating: false,
    parse: () => null,
    execute: ({ workspace }) => workspace.inventory.read(),
    render: (content) => success(`=== INVENTORY: inventory/hosts.ini ===\n\n${content}`),
  }),

  defineTool({
    name: "ansible_write_inventory",
    description: "Replace the inventory file. The content must parse as an INI inventory; the old file is backed up.",
    args: { content: "Full INI inventory content" },
    mutating: true,
    parse: (args) => ({ content: requiredArg(args, "content", "content") }),
    execute: ({ workspace }, req) => workspace.inventory.write(req.content),
    render: (res) =>
      success(`Inventory updated.${res.backup ? `\nBackup saved to: ${res.backup.backupPath}` : ""}`),
  }),

  defineTool({
    name: "ansible_add_host",
    description: "Add a host to an inventory group; the group section is created when missing.",
    args: {
      hostname: "Inventory host name",
      ansible_host: "Address (IP or DNS name) the engine connects to",
      group: "Group to add the host to (default: all)",
      extra_vars: "Extra host variables as key=value pairs separated by spaces",
    },
    mutating: true,
    parse: (args) => ({
      host: requiredArg(args, "hostname", "name"),
      address: requiredArg(args, "ansible_host", "path"),
      group: optionalArg(args, "group", "name") ?? "all",
      extraVars: optionalArg(args, "extra_vars", "text"),
    }),
    execute: ({ workspace }, req) => workspace.inventory.addHost(req),
    render: (res) => success(`Host '${res.host}' added to group [${res.groups[0]}]:\n  ${res.line}`),
  }),

  defineTool({
    name: "ansible_remove_host",
    description: "Remove a host from the inventory (every line naming it). Requires confirm=yes.",
    args: { hostname: "Inventory host name", confirm: "Set to 'yes' to confirm" },
    mutating: true,
    parse: (args) => {
      const host = requiredArg(args, "hostname", "name");
      requireConfirm(args, `remove host '${host}'`);
      return { host };
    },
    execute: ({ workspace }, req) => workspace.inventory.removeHost(req.host),
    render: (res) =>
      success(
        `Host '${res.host}' removed from ${res.groups.map((g) => `[${g}]`).join(", ")}.${
          res.droppedGroups.length
            ? `\nEmpty group section removed: ${res.droppedGroups.map((g) => `[${g}]`).join(", ")}`
            : ""
        }${res.backup ? `\nBackup saved to: ${res.backup.backupPath}` : ""}`,
      ),
  }),

  defineTool({
    name: "ansible_list_inventory",
    description: "List hosts and groups of the inventory. Set show_vars=yes to include inline host variables.",
    args: { show_vars: "Set to 'yes' to show host variables" },
    mutating: false,
    parse: (args) => ({ showVars: flagArg(args, "show_vars") }),
    execute: ({ workspace }) => workspace.inventory.list(),
    render: (listing, req) => success(renderListing(listing, req.showVars)),
  }),
];
