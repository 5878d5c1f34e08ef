/**
 * Matchflow — Atomic File Writes
 *
 * Write to a temp file beside the target, fsync, then rename over it.
 * Readers see either the old content or the new, never a torn file.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { nanoid } from 'nanoid';

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${nanoid(8)}.tmp`);

  await fs.mkdir(dir, { recursive: true });

  const handle = await fs.open(tempPath, 'w');
  try {
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
