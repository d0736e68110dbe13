import fs from "node:fs/promises";

import { NotFound } from "../../errors.js";
import { isMissingError } from "../../utils/validate.js";
import { isBackupPath } from "../workspace/backupManager.js";
import { LAYOUT } from "../workspace/layout.js";
import type { ManagedFiles, WriteOutcome } from "../workspace/managedFiles.js";

const TEMPLATE_EXTENSIONS = [".j2", ".jinja2"] as const;

export function templateFileName(name: string): string {
  return TEMPLATE_EXTENSIONS.some((ext) => name.endsWith(ext)) ? name : `${name}.j2`;
}

export type TemplateStore = {
  list(): Promise<string[]>;
  read(name: string): Promise<{ name: string; path: string; content: string }>;
  create(name: string, content: string): Promise<WriteOutcome>;
};

export function createTemplateStore(opts: { files: ManagedFiles }): TemplateStore {
  const { files } = opts;
  const pathOf = (name: string) => `${LAYOUT.templatesDir}/${templateFileName(name)}`;

  return {
    async list() {
      const dir = await files.guard.resolve(LAYOUT.templatesDir);
      const names = await fs.readdir(dir).catch((err: unknown) => {
        if (isMissingError(err)) return [];
        throw err;
      });
      return names.filter((n) => !isBackupPath(n) && TEMPLATE_EXTENSIONS.some((ext) => n.endsWith(ext))).sort();
    },

    async read(name) {
      const rel = pathOf(name);
      const content = await files.readOptional(rel);
      if (content === null) throw new NotFound(`template '${templateFileName(name)}'`);
      return { name: templateFileName(name), path: rel, content };
    },

    create: (name, content) => files.create(pathOf(name), content),
  };
}
