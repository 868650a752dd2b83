import { mkdir, rm, rename, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';

/**
 * Writes content to a file atomically using temp file + rename.
 * The parent directory is created when missing.
 */
export async function atomicWrite(filePath: string, content: string, mode = 0o644): Promise<void> {
  const dir = dirname(filePath);
  const tempPath = join(dir, `.${basename(filePath)}-${randomUUID()}.tmp`);

  await mkdir(dir, { recursive: true });
  try {
    await writeFile(tempPath, content, { mode });
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
