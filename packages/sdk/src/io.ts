/**
 * File I/O for source tables and generated modules
 *
 * Invariants:
 * - Writes are atomic: never observe a partially generated module
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { ArtifactWriteError, SourceReadError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Error code of a failed fs call, if any
 */
function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Read a property table
 * @throws SourceReadError if the file cannot be read
 */
export async function readSource(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new SourceReadError(filePath, { cause: err });
  }
}

/**
 * Read a previously generated module
 * @returns File contents, or null if the file doesn't exist
 * @throws SourceReadError for other read failures
 */
export async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new SourceReadError(filePath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 * @throws ArtifactWriteError if any step fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  let fileHandle: fs.FileHandle | null = null;

  try {
    await fs.mkdir(dir, { recursive: true });

    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content, "utf-8");

    // Sync file data to disk (prefer datasync, fall back to sync)
    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    // Best-effort fsync of the parent directory
    try {
      const dirHandle = await fs.open(dir, "r");
      try {
        await dirHandle.sync();
      } finally {
        await dirHandle.close();
      }
    } catch (err) {
      const code = errorCode(err);
      if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
        logger.debug("artifact.dir_fsync_failed", {
          source: dir,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("artifact.close_failed", { source: tmp, message: String(closeErr) });
      });
    }

    // Temp file may not exist yet
    await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
      logger.debug("artifact.cleanup_failed", { source: tmp, message: String(rmErr) });
    });

    throw new ArtifactWriteError(filePath, { cause: err });
  }
}
