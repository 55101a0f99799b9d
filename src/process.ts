import { spawn } from "child_process";

import { ExternalCommandError } from "./errors";

/** keep at most this much stderr for error messages */
const STDERR_TAIL_BYTES = 16 * 1024;

export type RunOptions = {
  /** working directory */
  cwd?: string;
  /** suppress stdout/stderr of the command */
  quiet?: boolean;
  /** extra environment variables */
  env?: Record<string, string>;
};

export type CaptureResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
};

/**
 * Runs external programs. Every call blocks the caller until the program
 * exits; there is no timeout.
 */
export interface CommandRunner {
  /** Run a program; rejects with ExternalCommandError on a non-zero exit. */
  run(command: string, args: string[], options?: RunOptions): Promise<void>;
  /** Run a program and collect its output; never rejects on exit status. */
  capture(command: string, args: string[], options?: Omit<RunOptions, "quiet">): Promise<CaptureResult>;
}

function appendTail(current: string, chunk: Buffer): string {
  const next = current + chunk.toString("utf8");
  return next.length > STDERR_TAIL_BYTES ? next.slice(next.length - STDERR_TAIL_BYTES) : next;
}

export class ChildProcessRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        // quiet mode still keeps stderr so failures can be explained
        stdio: options.quiet ? ["ignore", "ignore", "pipe"] : "inherit",
      });

      let stderr = "";
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr = appendTail(stderr, chunk);
      });

      child.on("error", (err) => {
        reject(new ExternalCommandError({ command, args, exitCode: null, cause: err }));
      });

      child.on("close", (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(new ExternalCommandError({ command, args, exitCode: code, signal, stderr }));
      });
    });
  }

  capture(
    command: string,
    args: string[],
    options: Omit<RunOptions, "quiet"> = {},
  ): Promise<CaptureResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: ["ignore", "pipe", "pipe"],
      });

      const stdout: Buffer[] = [];
      let stderr = "";
      child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr = appendTail(stderr, chunk);
      });

      child.on("error", (err) => {
        reject(new ExternalCommandError({ command, args, exitCode: null, cause: err }));
      });

      child.on("close", (code, signal) => {
        resolve({
          exitCode: code,
          signal,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr,
        });
      });
    });
  }
}

/** Quote a single argument for `/bin/sh`. */
export function shellQuote(arg: string): string {
  if (arg.length > 0 && /^[A-Za-z0-9_\-./=:,+@%]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function shellJoin(args: readonly string[]): string {
  return args.map(shellQuote).join(" ");
}
