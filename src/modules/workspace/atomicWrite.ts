import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

/**
 * Writes through a hidden temp file in the target directory and renames it
 * over the target, so readers never observe a half-written file.
 */
export async function writeFileAtomic(absolutePath: string, content: string): Promise<void> {
  const dir = path.dirname(absolutePath);
  await fs.mkdir(dir, { recursive: true });

  const tmp = path.join(dir, `.${path.basename(absolutePath)}.${crypto.randomBytes(6).toString("hex")}.tmp`);
  const handle = await fs.open(tmp, "wx");
  try {
    await handle.writeFile(content, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }

  try {
    await fs.rename(tmp, absolutePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}
