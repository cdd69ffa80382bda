/**
 * Scoped scratch files for staging archives
 */

import { mkdir, mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { toSafeFileName } from "../../utils/path";

/**
 * Run `fn` with a path inside a fresh private directory that is removed
 * afterwards, whether `fn` resolves, throws or is aborted.
 */
export async function withScratchFile<T>(
  baseDir: string | undefined,
  label: string,
  fn: (scratchPath: string) => Promise<T>,
): Promise<T> {
  const base = baseDir ?? os.tmpdir();
  await mkdir(base, { recursive: true });

  const dir = await mkdtemp(path.join(base, `stowage-${toSafeFileName(label)}-`));
  try {
    return await fn(path.join(dir, "archive"));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
