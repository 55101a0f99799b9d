import fs from "fs";
import os from "os";
import path from "path";
import { Readable } from "stream";
import { gzipSync } from "zlib";
import type { TestContext } from "node:test";

import type { DownloadFetch, DownloadRequestInit } from "../../src/download";
import { ExternalCommandError } from "../../src/errors";
import type { CaptureResult, CommandRunner, RunOptions } from "../../src/process";
import type { Reporter } from "../../src/progress";
import type { Recipe } from "../../src/recipe";

/** Fresh directory removed when the test ends. */
export function tempDir(t: TestContext, prefix = "hearth-test-"): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  t.after(() => fs.rmSync(dir, { recursive: true, force: true }));
  return dir;
}

export type TarFixtureEntry = {
  name: string;
  content?: string | Buffer;
  type?: "file" | "directory" | "symlink";
  linkName?: string;
  mode?: number;
};

function writeField(block: Buffer, offset: number, length: number, value: string) {
  block.write(value.slice(0, length), offset, length, "utf8");
}

function octal(value: number, length: number): string {
  return value.toString(8).padStart(length - 1, "0") + "\0";
}

/** Minimal ustar writer for test archives. */
export function buildTar(entries: TarFixtureEntry[]): Buffer {
  const blocks: Buffer[] = [];
  for (const entry of entries) {
    const type = entry.type ?? "file";
    const data =
      type === "file" ? Buffer.from(entry.content ?? "") : Buffer.alloc(0);
    const header = Buffer.alloc(512);

    writeField(header, 0, 100, entry.name);
    writeField(header, 100, 8, octal(entry.mode ?? (type === "directory" ? 0o755 : 0o644), 8));
    writeField(header, 108, 8, octal(0, 8));
    writeField(header, 116, 8, octal(0, 8));
    writeField(header, 124, 12, octal(data.length, 12));
    writeField(header, 136, 12, octal(0, 12));
    writeField(header, 148, 8, "        ");
    writeField(header, 156, 1, type === "directory" ? "5" : type === "symlink" ? "2" : "0");
    writeField(header, 157, 100, entry.linkName ?? "");
    writeField(header, 257, 6, "ustar\0");
    writeField(header, 263, 2, "00");

    let sum = 0;
    for (const byte of header) sum += byte;
    writeField(header, 148, 8, sum.toString(8).padStart(6, "0") + "\0 ");

    blocks.push(header);
    if (data.length > 0) {
      const padded = Buffer.alloc(Math.ceil(data.length / 512) * 512);
      data.copy(padded);
      blocks.push(padded);
    }
  }
  blocks.push(Buffer.alloc(1024));
  return Buffer.concat(blocks);
}

export function buildTarGz(entries: TarFixtureEntry[]): Buffer {
  return gzipSync(buildTar(entries));
}

export type FetchCall = { url: string; init: DownloadRequestInit };

/** Fetch stand-in serving fixed bytes; records every request. */
export function createFakeFetch(
  body: Buffer,
  options: { status?: number; statusText?: string } = {},
): DownloadFetch & { calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  const status = options.status ?? 200;
  const fetcher = async (url: string, init: DownloadRequestInit) => {
    calls.push({ url, init });
    return {
      ok: status >= 200 && status < 300,
      status,
      statusText: options.statusText ?? (status === 200 ? "OK" : ""),
      headers: {
        get: (name: string) => (name.toLowerCase() === "content-length" ? String(body.length) : null),
      },
      body: Readable.from([body]),
    };
  };
  return Object.assign(fetcher, { calls });
}

export type RunnerCall = {
  command: string;
  args: string[];
  cwd?: string;
  quiet?: boolean;
  kind: "run" | "capture";
};

export type ScriptedResult = {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  /** simulate a spawn failure (e.g. ENOENT) */
  spawnError?: NodeJS.ErrnoException;
};

/**
 * Command runner that never spawns anything. `script` decides the outcome of
 * each call (default: exit 0).
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RunnerCall[] = [];

  constructor(private readonly script: (call: RunnerCall) => ScriptedResult = () => ({})) {}

  /** calls rendered as `command arg...` lines */
  lines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(" "));
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<void> {
    const call: RunnerCall = { command, args, cwd: options.cwd, quiet: options.quiet, kind: "run" };
    this.calls.push(call);
    const result = this.script(call);
    if (result.spawnError) {
      throw new ExternalCommandError({ command, args, exitCode: null, cause: result.spawnError });
    }
    const exitCode = result.exitCode ?? 0;
    if (exitCode !== 0) {
      throw new ExternalCommandError({ command, args, exitCode, stderr: result.stderr ?? "" });
    }
  }

  async capture(command: string, args: string[], options: RunOptions = {}): Promise<CaptureResult> {
    const call: RunnerCall = { command, args, cwd: options.cwd, kind: "capture" };
    this.calls.push(call);
    const result = this.script(call);
    if (result.spawnError) {
      throw new ExternalCommandError({ command, args, exitCode: null, cause: result.spawnError });
    }
    return {
      exitCode: result.exitCode ?? 0,
      signal: null,
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
    };
  }
}

export function enoent(binary: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`spawn ${binary} ENOENT`), { code: "ENOENT", path: binary });
}

export type RecordingReporter = Reporter & {
  events: string[];
};

/** Reporter that records `progress:`, `done`, `warn:` and `info:` events. */
export function createRecordingReporter(): RecordingReporter {
  const events: string[] = [];
  return {
    events,
    progress: (label) => events.push(`progress:${label}`),
    done: () => events.push("done"),
    warn: (message) => events.push(`warn:${message}`),
    info: (message) => events.push(`info:${message}`),
  };
}

export function makeRecipe(overrides: Partial<Recipe> & { id: string }): Recipe {
  return {
    source: { url: `https://example.test/${overrides.id}-1.0.tar.gz`, method: "tarball" },
    steps: { build: [], package: [] },
    ...overrides,
  };
}

export function writeRecipeFile(recipesDir: string, recipe: Recipe): string {
  fs.mkdirSync(recipesDir, { recursive: true });
  const filePath = path.join(recipesDir, `${recipe.id}.json`);
  fs.writeFileSync(filePath, JSON.stringify(recipe, null, 2));
  return filePath;
}
