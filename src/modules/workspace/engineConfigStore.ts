import type { LoggerFn } from "../../logger.js";
import { LAYOUT } from "./layout.js";
import type { ManagedFiles, WriteOutcome } from "./managedFiles.js";

export type EngineConfigStore = {
  readonly path: string;
  read(): Promise<string>;
  write(content: string): Promise<WriteOutcome>;
};

export function createEngineConfigStore(opts: { files: ManagedFiles; log: LoggerFn }): EngineConfigStore {
  const { files, log } = opts;
  return {
    path: LAYOUT.engineConfig,
    read: () => files.read(LAYOUT.engineConfig),
    async write(content) {
      const outcome = await files.write(LAYOUT.engineConfig, content);
      log("engine config written", { backup: outcome.backup?.backupPath ?? null });
      return outcome;
    },
  };
}
