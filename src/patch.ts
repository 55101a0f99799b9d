import fs from "fs";
import path from "path";
import { structuredPatch } from "diff";

import type { CacheStore } from "./cache-store";
import { noopDebugLog, type DebugLogFn } from "./debug";
import { MissingWorkdirError, NotFetchedError, StaleWorkflowError } from "./errors";
import { copyTree, isDirectory, removeTree } from "./fs-utils";
import type { ConfirmFn } from "./prompt";
import { silentReporter, type Reporter } from "./progress";

/** lines of unchanged context around each hunk */
const CONTEXT_LINES = 3;
/** bytes inspected when deciding whether a file is binary */
const BINARY_SNIFF_BYTES = 8000;

type TreeEntry = {
  /** git file mode (`100644`, `100755`, `120000`) */
  mode: string;
  content: Buffer;
};

function collectTree(root: string): Map<string, TreeEntry> {
  const entries = new Map<string, TreeEntry>();
  const walk = (dir: string, prefix: string) => {
    for (const name of fs.readdirSync(dir).sort()) {
      const absolute = path.join(dir, name);
      const relative = prefix ? `${prefix}/${name}` : name;
      const stat = fs.lstatSync(absolute);
      if (stat.isDirectory()) {
        walk(absolute, relative);
      } else if (stat.isSymbolicLink()) {
        entries.set(relative, { mode: "120000", content: Buffer.from(fs.readlinkSync(absolute)) });
      } else if (stat.isFile()) {
        entries.set(relative, {
          mode: stat.mode & 0o111 ? "100755" : "100644",
          content: fs.readFileSync(absolute),
        });
      }
    }
  };
  walk(root, "");
  return entries;
}

function isBinary(content: Buffer): boolean {
  return content.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

function formatRange(start: number, count: number): string {
  // a zero-length range names the line before it
  const first = count === 0 ? start - 1 : start;
  return count === 1 ? `${first}` : `${first},${count}`;
}

/** Single hunk adding or removing a whole file. */
function wholeFileHunk(text: string, sign: "+" | "-"): string[] {
  const lines = text.split("\n");
  const terminated = text.endsWith("\n");
  if (terminated) lines.pop();

  const range = formatRange(1, lines.length);
  const header = sign === "+" ? `@@ -0,0 +${range} @@` : `@@ -${range} +0,0 @@`;
  const body = lines.map((line) => `${sign}${line}`);
  return terminated ? [header, ...body] : [header, ...body, "\\ No newline at end of file"];
}

function formatHunks(oldText: string, newText: string): string[] {
  if (oldText.length === 0) return wholeFileHunk(newText, "+");
  if (newText.length === 0) return wholeFileHunk(oldText, "-");

  const { hunks } = structuredPatch("a", "b", oldText, newText, undefined, undefined, {
    context: CONTEXT_LINES,
  });
  const lines: string[] = [];
  for (const hunk of hunks) {
    lines.push(
      `@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`,
    );
    lines.push(...hunk.lines);
  }
  return lines;
}

function diffEntry(
  file: string,
  before: TreeEntry | undefined,
  after: TreeEntry | undefined,
): string[] {
  const oldPath = before ? `a/${file}` : "/dev/null";
  const newPath = after ? `b/${file}` : "/dev/null";
  const header = [`diff --git a/${file} b/${file}`];

  if (!before && after) {
    header.push(`new file mode ${after.mode}`);
  } else if (before && !after) {
    header.push(`deleted file mode ${before.mode}`);
  } else if (before && after && before.mode !== after.mode) {
    header.push(`old mode ${before.mode}`, `new mode ${after.mode}`);
  }

  const oldContent = before?.content ?? Buffer.alloc(0);
  const newContent = after?.content ?? Buffer.alloc(0);
  if (oldContent.equals(newContent)) {
    // mode change, or an empty file added/removed
    return header.length > 1 ? header : [];
  }

  if (isBinary(oldContent) || isBinary(newContent)) {
    return [...header, `Binary files ${oldPath} and ${newPath} differ`];
  }

  // latin1 maps every byte to one code unit, so any source encoding survives
  const hunks = formatHunks(oldContent.toString("latin1"), newContent.toString("latin1"));
  return [...header, `--- ${oldPath}`, `+++ ${newPath}`, ...hunks];
}

/**
 * Git-style unified diff from `oldDir` to `newDir`.
 *
 * Paths carry `a/` and `b/` prefixes so the result applies with `patch -p1`
 * or `git apply`. Identical trees give an empty string. File contents are
 * decoded as latin1; write the result back with the same encoding.
 */
export function diffTrees(oldDir: string, newDir: string): string {
  const before = collectTree(oldDir);
  const after = collectTree(newDir);
  const files = [...new Set([...before.keys(), ...after.keys()])].sort();

  const lines: string[] = [];
  for (const file of files) {
    lines.push(...diffEntry(file, before.get(file), after.get(file)));
  }
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

export type PatchOptions = {
  cache: CacheStore;
  /** directory that holds `<id>-workdir` and `<id>.patch` */
  cwd: string;
  reporter?: Reporter;
  debug?: DebugLogFn;
};

export function workdirPath(cwd: string, recipeId: string): string {
  return path.join(cwd, `${recipeId}-workdir`);
}

export function patchFilePath(cwd: string, recipeId: string): string {
  return path.join(cwd, `${recipeId}.patch`);
}

/** Seed `<id>-workdir` from the clean snapshot. */
export function makePatch(recipeId: string, options: PatchOptions): string {
  const reporter = options.reporter ?? silentReporter;
  const clean = options.cache.cleanSourceDir(recipeId);
  if (!isDirectory(clean)) {
    throw new NotFetchedError(recipeId);
  }

  const workdir = workdirPath(options.cwd, recipeId);
  if (fs.existsSync(workdir)) {
    throw new StaleWorkflowError(
      `Workdir already exists at ${workdir} (run 'hearth save-patch --recipe=${recipeId}' or remove it first)`,
    );
  }

  copyTree(clean, workdir);
  reporter.info(
    `Created new directory '${path.basename(workdir)}', make your changes and run 'save-patch'`,
  );
  return workdir;
}

export type SavePatchOptions = PatchOptions & {
  /** skip the prompt and remove (or keep) the workdir */
  removeWorkdir?: boolean;
  confirm?: ConfirmFn;
};

export type SavePatchResult = {
  patchPath: string;
  /** the diff written to `patchPath` (latin1, one char per byte) */
  patch: string;
  workdirRemoved: boolean;
};

/** Diff the workdir against the clean snapshot into `<id>.patch`. */
export async function savePatch(
  recipeId: string,
  options: SavePatchOptions,
): Promise<SavePatchResult> {
  const reporter = options.reporter ?? silentReporter;
  const debug = options.debug ?? noopDebugLog;
  const clean = options.cache.cleanSourceDir(recipeId);
  if (!isDirectory(clean)) {
    throw new NotFetchedError(recipeId);
  }

  const workdir = workdirPath(options.cwd, recipeId);
  if (!isDirectory(workdir)) {
    throw new MissingWorkdirError(recipeId, workdir);
  }

  const patch = diffTrees(clean, workdir);
  const patchPath = patchFilePath(options.cwd, recipeId);
  fs.writeFileSync(patchPath, patch, "latin1");
  debug("patch", `${recipeId}: ${patch.length} bytes of diff`);
  reporter.info(`Saved patch to ${path.basename(patchPath)}`);

  let remove = options.removeWorkdir;
  if (remove === undefined) {
    remove = options.confirm ? await options.confirm("Remove workdir directory?", true) : true;
  }
  if (remove) {
    removeTree(workdir);
  }

  return { patchPath, patch, workdirRemoved: remove };
}
