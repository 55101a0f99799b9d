import fs from "fs";
import path from "path";
import { gunzipSync } from "zlib";
import { execFileSync } from "child_process";

import { ExternalCommandError } from "./errors";
import { isErrnoException, moveEntry } from "./fs-utils";
import { isRecord } from "./json";

const BLOCK_SIZE = 512;

/** a single entry parsed from a tar archive */
export type TarEntry = {
  /** path inside the archive */
  name: string;
  type: "file" | "directory" | "symlink" | "hardlink";
  /** permission bits */
  mode: number;
  /** link target (symlink/hardlink only) */
  linkName: string;
  /** file contents (file only) */
  data: Buffer;
};

function readString(block: Buffer, offset: number, length: number): string {
  const slice = block.subarray(offset, offset + length);
  const end = slice.indexOf(0);
  return slice.subarray(0, end === -1 ? slice.length : end).toString("utf8");
}

function readNumber(block: Buffer, offset: number, length: number): number {
  // GNU base-256 encoding for large values
  if ((block[offset] ?? 0) & 0x80) {
    let value = (block[offset] ?? 0) & 0x7f;
    for (let i = 1; i < length; i++) {
      value = value * 256 + (block[offset + i] ?? 0);
    }
    return value;
  }
  const text = readString(block, offset, length).trim();
  return text.length > 0 ? Number.parseInt(text, 8) : 0;
}

function parsePaxRecords(data: Buffer): Map<string, string> {
  const records = new Map<string, string>();
  let offset = 0;
  while (offset < data.length) {
    const space = data.indexOf(0x20, offset);
    if (space === -1) break;
    const length = Number.parseInt(data.subarray(offset, space).toString("utf8"), 10);
    if (!Number.isFinite(length) || length <= 0) break;
    const record = data.subarray(space + 1, offset + length - 1).toString("utf8");
    const eq = record.indexOf("=");
    if (eq > 0) {
      records.set(record.slice(0, eq), record.slice(eq + 1));
    }
    offset += length;
  }
  return records;
}

/**
 * Parse a raw (uncompressed) tar archive into entries.
 *
 * Understands ustar prefixes, GNU long names and pax `path`/`linkpath`
 * records. Other entry types (devices, fifos) are skipped.
 */
export function parseTar(buf: Buffer): TarEntry[] {
  const entries: TarEntry[] = [];
  let offset = 0;
  let longName: string | null = null;
  let longLink: string | null = null;
  let pax: Map<string, string> | null = null;

  while (offset + BLOCK_SIZE <= buf.length) {
    const header = buf.subarray(offset, offset + BLOCK_SIZE);
    if (header.every((byte) => byte === 0)) break;

    const size = readNumber(header, 124, 12);
    const typeflag = String.fromCharCode(header[156] ?? 0);
    const dataStart = offset + BLOCK_SIZE;
    const data = buf.subarray(dataStart, dataStart + size);
    offset = dataStart + Math.ceil(size / BLOCK_SIZE) * BLOCK_SIZE;

    if (typeflag === "L") {
      longName = readString(data, 0, data.length);
      continue;
    }
    if (typeflag === "K") {
      longLink = readString(data, 0, data.length);
      continue;
    }
    if (typeflag === "x") {
      pax = parsePaxRecords(data);
      continue;
    }
    if (typeflag === "g") {
      continue;
    }

    let name = readString(header, 0, 100);
    const magic = readString(header, 257, 6);
    if (magic.startsWith("ustar")) {
      const prefix = readString(header, 345, 155);
      if (prefix) name = `${prefix}/${name}`;
    }
    let linkName = readString(header, 157, 100);

    if (longName !== null) name = longName;
    if (longLink !== null) linkName = longLink;
    name = pax?.get("path") ?? name;
    linkName = pax?.get("linkpath") ?? linkName;
    longName = null;
    longLink = null;
    pax = null;

    const mode = readNumber(header, 100, 8);

    let type: TarEntry["type"] | null = null;
    if (typeflag === "0" || typeflag === "\0" || typeflag === "7") type = "file";
    else if (typeflag === "5") type = "directory";
    else if (typeflag === "2") type = "symlink";
    else if (typeflag === "1") type = "hardlink";
    if (type === null) continue;

    entries.push({
      name,
      type,
      mode,
      linkName,
      data: type === "file" ? Buffer.from(data) : Buffer.alloc(0),
    });
  }

  return entries;
}

function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/** Resolve an archive path inside `destDir`, rejecting traversal. */
function resolveEntryPath(destDir: string, name: string): string | null {
  const normalized = path.posix.normalize(name.replace(/\\/g, "/"));
  if (normalized === "." || normalized === "./" || normalized === "") return null;
  if (path.posix.isAbsolute(normalized) || normalized === ".." || normalized.startsWith("../")) {
    throw new Error(`archive entry escapes extraction directory: ${name}`);
  }
  return path.join(destDir, normalized);
}

function assertRealParentWithin(root: string, target: string): void {
  const parent = fs.realpathSync(path.dirname(target));
  if (!isWithin(root, parent)) {
    throw new Error(`archive entry escapes extraction directory through a symlink: ${target}`);
  }
}

/** Extract parsed entries into `destDir` (safe against path and symlink traversal). */
export function extractTarEntries(entries: TarEntry[], destDir: string): void {
  fs.mkdirSync(destDir, { recursive: true });
  const root = fs.realpathSync(destDir);

  for (const entry of entries) {
    const target = resolveEntryPath(root, entry.name);
    if (target === null) continue;

    if (entry.type === "directory") {
      fs.mkdirSync(target, { recursive: true });
      assertRealParentWithin(root, path.join(target, "."));
      continue;
    }

    fs.mkdirSync(path.dirname(target), { recursive: true });
    assertRealParentWithin(root, target);
    fs.rmSync(target, { force: true });

    if (entry.type === "file") {
      fs.writeFileSync(target, entry.data, { mode: entry.mode & 0o777 || 0o644 });
    } else if (entry.type === "symlink") {
      const resolvedLink = path.resolve(path.dirname(target), entry.linkName);
      if (path.isAbsolute(entry.linkName) || !isWithin(root, resolvedLink)) {
        throw new Error(`archive symlink escapes extraction directory: ${entry.name} -> ${entry.linkName}`);
      }
      fs.symlinkSync(entry.linkName, target);
    } else {
      const source = resolveEntryPath(root, entry.linkName);
      if (source === null) {
        throw new Error(`invalid hardlink target in archive: ${entry.name} -> ${entry.linkName}`);
      }
      fs.copyFileSync(source, target);
    }
  }
}

/** Decompress gzip data when the magic bytes say so. */
export function decompressArchive(raw: Buffer): Buffer {
  if (raw.length >= 2 && raw[0] === 0x1f && raw[1] === 0x8b) {
    return gunzipSync(raw);
  }
  return raw;
}

/**
 * Extract a tar archive into `destDir` with the system `tar` (any compression
 * it understands), falling back to the in-process reader (plain or gzip) when
 * `tar` is not installed.
 */
export function extractArchive(archivePath: string, destDir: string): void {
  fs.mkdirSync(destDir, { recursive: true });
  try {
    execFileSync("tar", ["-xf", archivePath, "-C", destDir], {
      stdio: ["ignore", "pipe", "pipe"],
    });
    return;
  } catch (err) {
    if (!isErrnoException(err) || err.code !== "ENOENT") {
      const status = isRecord(err) ? err.status : undefined;
      const stderr = isRecord(err) ? err.stderr : undefined;
      throw new ExternalCommandError({
        command: "tar",
        args: ["-xf", archivePath, "-C", destDir],
        exitCode: typeof status === "number" ? status : null,
        stderr: Buffer.isBuffer(stderr) ? stderr.toString("utf8") : "",
        cause: err,
      });
    }
  }

  const raw = fs.readFileSync(archivePath);
  extractTarEntries(parseTar(decompressArchive(raw)), destDir);
}

/**
 * Move the extracted tree in `extractDir` to `finalDir`.
 *
 * An archive holding a single top-level directory (`foo-1.2/...`) is
 * flattened so its contents land directly in `finalDir`; otherwise every
 * top-level entry is moved into `finalDir`.
 */
export function flattenInto(extractDir: string, finalDir: string): void {
  const entries = fs.readdirSync(extractDir);
  const [first] = entries;
  if (entries.length === 1 && first !== undefined) {
    const only = path.join(extractDir, first);
    if (fs.lstatSync(only).isDirectory()) {
      moveEntry(only, finalDir);
      return;
    }
  }

  fs.mkdirSync(finalDir, { recursive: true });
  for (const entry of entries) {
    moveEntry(path.join(extractDir, entry), path.join(finalDir, entry));
  }
}
