import fs from "fs";
import path from "path";
import { randomUUID } from "crypto";

/**
 * Recursively copy `src` over `dst`, replacing files that exist in both and
 * keeping files only present in `dst`. Timestamps are preserved so build
 * tools do not see copied sources as modified.
 */
export function copyTree(src: string, dst: string): void {
  fs.mkdirSync(path.dirname(dst), { recursive: true });
  fs.cpSync(src, dst, {
    recursive: true,
    force: true,
    preserveTimestamps: true,
    verbatimSymlinks: true,
  });
}

/**
 * Move a file or directory to a new location, falling back to copy+remove
 * across devices.
 */
export function moveEntry(src: string, dst: string): void {
  fs.mkdirSync(path.dirname(dst), { recursive: true });
  try {
    fs.renameSync(src, dst);
  } catch (err) {
    if (isErrnoException(err) && err.code === "EXDEV") {
      fs.cpSync(src, dst, { recursive: true, preserveTimestamps: true, verbatimSymlinks: true });
      fs.rmSync(src, { recursive: true, force: true });
      return;
    }
    throw err;
  }
}

export function removeTree(target: string): void {
  fs.rmSync(target, { recursive: true, force: true });
}

/** Write a file through a sibling temp file and rename. */
export function writeFileAtomic(filePath: string, data: string | Uint8Array): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp-${randomUUID().slice(0, 8)}`;
  try {
    fs.writeFileSync(tmpPath, data);
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}
