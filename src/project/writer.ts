/**
 * Writes materialized files under a project root.
 *
 * Each file is written atomically (temp file + rename). Writes are not
 * transactional across files: a failure leaves earlier files in place.
 */

import { mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { FileSystemError } from "../errors/index.js";

export const FILE_MODE = 0o644;
export const EXECUTABLE_MODE = 0o755;

/**
 * Write every entry of `files` (project-relative posix path → content).
 * @returns the relative paths written, in insertion order
 */
export async function writeProjectFiles(
  root: string,
  files: ReadonlyMap<string, string>,
  mode: number = FILE_MODE,
): Promise<string[]> {
  const written: string[] = [];

  for (const [relativePath, content] of files) {
    const target = join(root, ...relativePath.split("/"));
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFileAtomic(target, content, { mode, encoding: "utf8" });
    } catch (error) {
      throw new FileSystemError("Failed to write file", target, error);
    }
    written.push(relativePath);
  }

  return written;
}
