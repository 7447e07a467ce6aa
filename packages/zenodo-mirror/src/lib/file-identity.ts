/**
 * Local file checks used to decide whether a remote file needs downloading.
 */

import { statSync } from "fs";

/**
 * Size in bytes of the regular file at `filePath`, or undefined when there
 * is none.
 */
export function getLocalSize(filePath: string): number | undefined {
  try {
    const stats = statSync(filePath);
    return stats.isFile() ? stats.size : undefined;
  } catch {
    return undefined;
  }
}

/**
 * A file counts as mirrored when it exists with exactly the remote size.
 * There is no content hash check.
 */
export function isAlreadyMirrored(filePath: string, remoteSize: number): boolean {
  return getLocalSize(filePath) === remoteSize;
}
