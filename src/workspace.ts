import fs from "node:fs/promises";

import type { WorkspaceConfig } from "./config.js";
import { CommandRunner } from "./executors/commandRunner.js";
import type { LoggerFn } from "./logger.js";
import { createDeviceCommands, type DeviceCommands } from "./modules/devices/deviceCommands.js";
import { createInventoryStore, type InventoryStore } from "./modules/inventory/inventoryStore.js";
import { createPlaybookStore, type PlaybookStore } from "./modules/playbooks/playbookStore.js";
import { createPathGuard, type PathGuard } from "./modules/security/pathGuard.js";
import { createTemplateStore, type TemplateStore } from "./modules/templates/templateStore.js";
import { createVariableStore, type VariableStore } from "./modules/vars/variableStore.js";
import { createBackupManager, type BackupManager } from "./modules/workspace/backupManager.js";
import { createEngineConfigStore, type EngineConfigStore } from "./modules/workspace/engineConfigStore.js";
import { createManagedFiles, type ManagedFiles } from "./modules/workspace/managedFiles.js";
import { createWorkspaceFiles, type WorkspaceFiles } from "./modules/workspace/workspaceFiles.js";

export type Workspace = Readonly<{
  config: WorkspaceConfig;
  guard: PathGuard;
  backups: BackupManager;
  files: ManagedFiles;
  runner: CommandRunner;
  workspaceFiles: WorkspaceFiles;
  inventory: InventoryStore;
  vars: VariableStore;
  engineConfig: EngineConfigStore;
  playbooks: PlaybookStore;
  templates: TemplateStore;
  devices: DeviceCommands;
}>;

/** Wires every component against one workspace root; the root is created when missing. */
export async function createWorkspace(config: WorkspaceConfig, opts: { log: LoggerFn; now?: () => Date }): Promise<Workspace> {
  const { log } = opts;
  await fs.mkdir(config.root, { recursive: true });

  const guard = await createPathGuard(config.root);
  const backups = createBackupManager({ guard, log, now: opts.now });
  const files = createManagedFiles({ guard, backups, log });
  const runner = new CommandRunner({
    cwd: guard.root,
    env: config.engine.env,
    maxOutputBytes: config.maxOutputBytes,
    killGraceMs: config.timeouts.killGraceMs,
    log,
  });
  const inventory = createInventoryStore({ files, log });

  return {
    config,
    guard,
    backups,
    files,
    runner,
    workspaceFiles: createWorkspaceFiles({ files, log }),
    inventory,
    vars: createVariableStore({ files, inventory, log }),
    engineConfig: createEngineConfigStore({ files, log }),
    playbooks: createPlaybookStore({ files, runner, config, log }),
    templates: createTemplateStore({ files }),
    devices: createDeviceCommands({ runner, config, log }),
  };
}
