import { randomUUID } from "node:crypto";
import { chmod, mkdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { PatchWriteError } from "../runtime/errors.js";

const currentMode = async (filePath: string): Promise<number | undefined> => {
  try {
    return (await stat(filePath)).mode & 0o7777;
  } catch {
    return undefined;
  }
};

/**
 * Writes `data` to a sibling temp file and renames it over `filePath`, so
 * readers see either the old bytes or the new ones. The temp file is removed
 * on every path that does not end in the rename, including an abort.
 */
export const writeFileAtomic = async (
  filePath: string,
  data: string,
  opts: { signal?: AbortSignal } = {}
): Promise<void> => {
  const dir = dirname(filePath);
  const tmpPath = join(dir, `.${basename(filePath)}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`);
  let committed = false;

  try {
    opts.signal?.throwIfAborted();
    await mkdir(dir, { recursive: true });
    const mode = await currentMode(filePath);
    await writeFile(tmpPath, data, "utf8");
    if (mode !== undefined) {
      await chmod(tmpPath, mode);
    }
    opts.signal?.throwIfAborted();
    await rename(tmpPath, filePath);
    committed = true;
  } catch (error) {
    if (opts.signal?.aborted) {
      throw error;
    }
    throw new PatchWriteError(filePath, error);
  } finally {
    if (!committed) {
      await rm(tmpPath, { force: true });
    }
  }
};
