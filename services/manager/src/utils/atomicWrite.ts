import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

/**
 * Write-to-temp then rename. Readers see either the previous document or the new one.
 */
export async function atomicWriteFile(filePath: string, content: string | Buffer, mode = 0o644): Promise<void> {
  const dir = path.dirname(filePath);
  const tmp = path.join(dir, `.${path.basename(filePath)}.tmp.${randomBytes(4).toString("hex")}`);
  await fs.mkdir(dir, { recursive: true });
  try {
    const handle = await fs.open(tmp, "w", mode);
    try {
      await handle.writeFile(content);
      await handle.datasync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, 2));
}
