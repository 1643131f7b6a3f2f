/**
 * Local file helpers for the run's work directory.
 *
 * Writes go to a sibling temp file that is then renamed over the target,
 * so a reader never sees a half-written JSON document.
 */

import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && error.code === "ENOENT";
}

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });
  const tmpPath = join(dir, `.${basename(filePath)}.${process.pid}.${Date.now()}.tmp`);

  try {
    await writeFile(tmpPath, content, "utf-8");
    await rename(tmpPath, filePath);
  } catch (error) {
    await unlink(tmpPath).catch((cleanupError: unknown) => {
      if (!isNotFound(cleanupError)) throw cleanupError;
    });
    throw error;
  }
}

export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2) + "\n");
}

/** File contents, or null when the file does not exist. Other read errors propagate. */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}
