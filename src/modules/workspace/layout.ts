export const LAYOUT = {
  inventory: "inventory/hosts.ini",
  engineConfig: "ansible.cfg",
  inventoryDir: "inventory",
  playbooksDir: "playbooks",
  groupVarsDir: "group_vars",
  hostVarsDir: "host_vars",
  rolesDir: "roles",
  templatesDir: "templates",
  filesDir: "files",
} as const;

export const WORKSPACE_DIRS = [
  LAYOUT.inventoryDir,
  LAYOUT.groupVarsDir,
  LAYOUT.hostVarsDir,
  LAYOUT.playbooksDir,
  LAYOUT.rolesDir,
  LAYOUT.templatesDir,
  LAYOUT.filesDir,
] as const;

export const YAML_EXTENSIONS = [".yml", ".yaml"] as const;

export function hasYamlExtension(name: string): boolean {
  const lower = name.toLowerCase();
  return YAML_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

export function stripYamlExtension(name: string): string {
  const lower = name.toLowerCase();
  for (const ext of YAML_EXTENSIONS) {
    if (lower.endsWith(ext)) return name.slice(0, -ext.length);
  }
  return name;
}

export const DEFAULT_ENGINE_CONFIG = `[defaults]
inventory = ${LAYOUT.inventory}
host_key_checking = False
timeout = 30
deprecation_warnings = False
interpreter_python = auto_silent

[persistent_connection]
connect_timeout = 30
command_timeout = 30
`;
