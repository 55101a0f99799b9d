import { EventEmitter } from "events";

import { noopDebugLog, type DebugLogFn } from "./debug";
import { ContainerExecError, ExternalCommandError } from "./errors";
import type { Image } from "./images";
import { shellJoin, shellQuote, type CommandRunner } from "./process";
import { silentReporter, type Reporter } from "./progress";
import { withRetry, type RetryPolicy } from "./retry";

/** exit status podman (and docker) use for their own failures */
const RUNTIME_FAILURE_EXIT = 125;

export type EnvironmentKind = "machine" | "container";

export type EnvironmentState = "unknown" | "absent" | "created" | "running";

export type StateChange = {
  kind: EnvironmentKind;
  state: EnvironmentState;
};

type ManagerOptions = {
  runtime: string;
  runner: CommandRunner;
  reporter?: Reporter;
  debug?: DebugLogFn;
};

abstract class EnvironmentResource extends EventEmitter {
  private state: EnvironmentState = "unknown";

  protected readonly runtime: string;
  protected readonly runner: CommandRunner;
  protected readonly reporter: Reporter;
  protected readonly debug: DebugLogFn;

  constructor(
    readonly kind: EnvironmentKind,
    readonly name: string,
    options: ManagerOptions,
  ) {
    super();
    this.runtime = options.runtime;
    this.runner = options.runner;
    this.reporter = options.reporter ?? silentReporter;
    this.debug = options.debug ?? noopDebugLog;
  }

  getState() {
    return this.state;
  }

  protected setState(state: EnvironmentState) {
    if (this.state === state) return;
    this.state = state;
    this.debug("env", `${this.kind} ${this.name}: ${state}`);
    this.emit("state", state);
  }

  /** Query by name; any non-zero status means absent. */
  protected async query(args: string[]): Promise<boolean> {
    const result = await this.runner.capture(this.runtime, args);
    return result.exitCode === 0;
  }
}

export type MachineOptions = ManagerOptions & {
  /** host directory shared with the machine */
  workspace: string;
};

/** The virtual machine the container runtime needs on non-Linux hosts. */
export class MachineManager extends EnvironmentResource {
  private readonly workspace: string;

  constructor(name: string, options: MachineOptions) {
    super("machine", name, options);
    this.workspace = options.workspace;
  }

  async exists(): Promise<boolean> {
    const found = await this.query(["machine", "inspect", this.name]);
    if (!found) this.setState("absent");
    else if (this.getState() !== "running") this.setState("created");
    return found;
  }

  /** Create the machine or start the existing one, then make it the default connection. */
  async ensure(): Promise<void> {
    this.reporter.progress(`Starting machine '${this.name}'`);

    if (!(await this.exists())) {
      await this.runner.run(
        this.runtime,
        ["machine", "init", this.name, "--rootful", "-v", this.workspace, "--now"],
        { quiet: true },
      );
    } else {
      try {
        await this.runner.run(this.runtime, ["machine", "start", this.name], { quiet: true });
      } catch (err) {
        // a machine that is already running refuses to start
        if (!(err instanceof ExternalCommandError) || err.exitCode === null) throw err;
        this.debug("env", `machine start ignored: ${err.message}`);
      }
    }
    this.setState("running");

    // the runtime keeps addressing its previous default otherwise
    await this.runner.run(this.runtime, ["system", "connection", "default", this.name]);
    this.reporter.done();
  }
}

export type ContainerOptions = ManagerOptions & {
  workspace: string;
  /** mount point of the workspace inside the container */
  mountPath: string;
  image: Image;
  /** command line that starts hearth inside the container */
  entrypoint: string;
  /** attempts per exec, including the first (default 2) */
  maxAttempts?: number;
};

export type ExecOptions = {
  quiet?: boolean;
  /** variables set for the command (`exec -e NAME=value`) */
  env?: Readonly<Record<string, string>>;
};

/** The long-lived build container. */
export class ContainerManager extends EnvironmentResource {
  private readonly options: ContainerOptions;

  constructor(name: string, options: ContainerOptions) {
    super("container", name, options);
    this.options = options;
  }

  async exists(): Promise<boolean> {
    const found = await this.query(["container", "exists", this.name]);
    if (!found) this.setState("absent");
    else if (this.getState() !== "running") this.setState("created");
    return found;
  }

  /** Create the container and run the image setup when it does not exist yet. */
  async ensure(): Promise<void> {
    if (await this.exists()) return;

    const { workspace, mountPath, image } = this.options;
    this.reporter.progress(`Creating container '${this.name}' from ${image.id}`);
    await this.runner.run(
      this.runtime,
      ["run", "-v", `${workspace}:${mountPath}`, "-dit", "--name", this.name, image.id, "/bin/bash"],
      { quiet: true },
    );
    this.setState("running");

    try {
      for (const command of image.setup) {
        await this.exec(command, { quiet: true });
      }
    } catch (err) {
      // a half set up container would be reused as is by the next run
      this.debug("env", `setup failed, removing container ${this.name}`);
      await this.runner.capture(this.runtime, ["rm", "-f", this.name]);
      this.setState("absent");
      throw err;
    }
    this.reporter.done();
  }

  async restart(): Promise<void> {
    await this.runner.run(this.runtime, ["restart", this.name], { quiet: true });
    this.setState("running");
  }

  /** Retry policy for exec: one restart, then one more try. */
  recoveryPolicy(): RetryPolicy {
    return {
      maxAttempts: this.options.maxAttempts ?? 2,
      shouldRetry: (err) => err instanceof ContainerExecError,
      beforeRetry: async (err, attempt) => {
        const message = err instanceof Error ? err.message : String(err);
        this.debug("exec", `attempt ${attempt} failed, restarting ${this.name}: ${message}`);
        await this.restart();
      },
    };
  }

  /**
   * Run a shell command inside the container.
   *
   * A non-zero exit of the command itself is an {@link ExternalCommandError}
   * and is not retried; only runtime failures trigger the restart.
   */
  exec(command: string, options: ExecOptions = {}): Promise<void> {
    return withRetry(() => this.execOnce(command, options), this.recoveryPolicy());
  }

  /**
   * Run hearth itself inside the container with the same arguments.
   *
   * `podman exec` does not inherit the caller's environment, so settings the
   * inner run needs travel in `env`.
   */
  reenter(args: readonly string[], env?: Readonly<Record<string, string>>): Promise<void> {
    return this.exec(reentryCommand(this.options.mountPath, this.options.entrypoint, args), { env });
  }

  private async execOnce(command: string, options: ExecOptions): Promise<void> {
    const args = ["exec", ...envArgs(options.env), this.name, "/bin/sh", "-c", command];
    this.debug("exec", `${this.name}: ${command}`);
    try {
      await this.runner.run(this.runtime, args, { quiet: options.quiet });
    } catch (err) {
      if (err instanceof ExternalCommandError && isRuntimeFailure(err)) {
        throw new ContainerExecError(this.name, {
          command: err.command,
          args: err.args,
          exitCode: err.exitCode,
          signal: err.signal,
          stderr: err.stderr,
          cause: err,
        });
      }
      throw err;
    }
    this.setState("running");
  }
}

function envArgs(env: Readonly<Record<string, string>> = {}): string[] {
  return Object.keys(env)
    .sort()
    .flatMap((name) => ["-e", `${name}=${env[name]}`]);
}

function isRuntimeFailure(err: ExternalCommandError): boolean {
  if (err.exitCode === RUNTIME_FAILURE_EXIT) return true;
  // never started (binary missing, or not executable)
  return err.exitCode === null && err.signal === null;
}

/** Shell line that re-invokes hearth inside the container, marked as such. */
export function reentryCommand(
  mountPath: string,
  entrypoint: string,
  args: readonly string[],
): string {
  return `cd ${shellQuote(mountPath)} && ${entrypoint} ${shellJoin([...args, "--in-container=true"])}`;
}

export type IsolationEnvironmentOptions = {
  runtime: string;
  runner: CommandRunner;
  workspace: string;
  machineName: string;
  containerName: string;
  mountPath: string;
  image: Image;
  entrypoint: string;
  platform?: NodeJS.Platform;
  reporter?: Reporter;
  debug?: DebugLogFn;
};

/**
 * Machine (non-Linux hosts only) plus container, created on demand.
 *
 * Emits `state` with a {@link StateChange} whenever either changes.
 */
export class IsolationEnvironment extends EventEmitter {
  readonly machine: MachineManager | null;
  readonly container: ContainerManager;

  constructor(options: IsolationEnvironmentOptions) {
    super();
    const platform = options.platform ?? process.platform;
    const shared = {
      runtime: options.runtime,
      runner: options.runner,
      reporter: options.reporter,
      debug: options.debug,
      workspace: options.workspace,
    };

    this.machine =
      platform === "linux" ? null : new MachineManager(options.machineName, shared);
    this.container = new ContainerManager(options.containerName, {
      ...shared,
      mountPath: options.mountPath,
      image: options.image,
      entrypoint: options.entrypoint,
    });

    this.machine?.on("state", (state: EnvironmentState) => this.forward("machine", state));
    this.container.on("state", (state: EnvironmentState) => this.forward("container", state));
  }

  /** Machine first (when needed), then container. */
  async ensure(): Promise<void> {
    if (this.machine) {
      await this.machine.ensure();
    }
    await this.container.ensure();
  }

  exec(command: string, options?: ExecOptions): Promise<void> {
    return this.container.exec(command, options);
  }

  reenter(args: readonly string[], env?: Readonly<Record<string, string>>): Promise<void> {
    return this.container.reenter(args, env);
  }

  private forward(kind: EnvironmentKind, state: EnvironmentState) {
    const change: StateChange = { kind, state };
    this.emit("state", change);
  }
}
