import os from "node:os";
import fs from "node:fs";
import path from "node:path";
import { rimraf } from "rimraf";

export const SCRATCH_PREFIX = "youtube-";

/**
 * Runs `fn` with a fresh temporary directory that is removed once `fn`
 * settles, whether it returned or threw.
 */
export async function withScratchDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const tempDir = fs.mkdtempSync(`${os.tmpdir()}${path.sep}${SCRATCH_PREFIX}`);

  try {
    return await fn(tempDir);
  } finally {
    rimraf.sync(tempDir);
  }
}
