import { isBlank, requiredArg } from "./args.js";
import { defineTool, success, type ToolDefinition } from "./types.js";

function renderList(names: readonly string[]): string {
  if (!names.length) return "No templates found.\n\nUse ansible_create_template to create one.";
  return ["=== TEMPLATES ===", "", ...names.map((n) => `- ${n}`)].join("\n");
}

export const templateTools: readonly ToolDefinition[] = [
  defineTool({
    name: "ansible_list_templates",
    description: "List Jinja2 templates (*.j2, *.jinja2) in templates/.",
    args: {},
    mutating: false,
    parse: () => null,
    execute: ({ workspace }) => workspace.templates.list(),
    render: (names) => success(renderList(names)),
  }),
  defineTool({
    name: "ansible_read_template",
    description: "Read a Jinja2 template. Without a name, lists the templates.",
    args: { template_name: "Template name; .j2 is appended when missing" },
    mutating: false,
    parse: (args) => ({ name: isBlank(args, "template_name") ? null : requiredArg(args, "template_name", "name") }),
    execute: async ({ workspace }, req) =>
      req.name === null
        ? { kind: "list" as const, names: await workspace.templates.list() }
        : { kind: "template" as const, ...(await workspace.templates.read(req.name)) },
    render: (res) =>
      res.kind === "list" ? success(renderList(res.names)) : success(`=== TEMPLATE: ${res.name} ===\n\n${res.content}`),
  }),
  defineTool({
    name: "ansible_create_template",
    description: "Create a new Jinja2 template in templates/. Fails when it already exists.",
    args: { template_name: "Template name; .j2 is appended when missing", content: "Template body" },
    mutating: true,
    parse: (args) => ({
      name: requiredArg(args, "template_name", "name"),
      content: requiredArg(args, "content", "content"),
    }),
    execute: ({ workspace }, req) => workspace.templates.create(req.name, req.content),
    render: (res) => success(`Template created: ${res.path}`),
  }),
];
