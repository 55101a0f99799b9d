/** stable error codes surfaced by hearth */
export type HearthErrorCode =
  | "usage"
  | "configuration"
  | "recipe_parse"
  | "integrity"
  | "unsupported_method"
  | "download"
  | "external_command"
  | "container_exec"
  | "stale_workflow";

export class HearthError extends Error {
  /** stable error code */
  readonly code: HearthErrorCode;

  constructor(code: HearthErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HearthError";
    this.code = code;
  }
}

/** Bad command line; the CLI prints usage alongside the message. */
export class UsageError extends HearthError {
  /** command whose usage applies, if known */
  readonly command: string | null;

  constructor(message: string, command: string | null = null) {
    super("usage", message);
    this.name = "UsageError";
    this.command = command;
  }
}

/** Unknown image, missing recipes directory, missing recipe file, bad config. */
export class ConfigurationError extends HearthError {
  constructor(message: string, code: HearthErrorCode = "configuration") {
    super(code, message);
    this.name = "ConfigurationError";
  }
}

/** A recipe file is not valid JSON or does not have the recipe shape. */
export class RecipeParseError extends ConfigurationError {
  /** file or label the recipe was read from */
  readonly where: string;

  constructor(where: string, message: string) {
    super(`invalid recipe ${where}: ${message}`, "recipe_parse");
    this.name = "RecipeParseError";
    this.where = where;
  }
}

export class IntegrityError extends HearthError {
  constructor(message: string) {
    super("integrity", message);
    this.name = "IntegrityError";
  }
}

export class UnsupportedMethodError extends HearthError {
  /** the rejected source method or url scheme */
  readonly method: string;

  constructor(method: string, message = `Unknown source method '${method}'`) {
    super("unsupported_method", message);
    this.name = "UnsupportedMethodError";
    this.method = method;
  }
}

export class DownloadError extends HearthError {
  readonly url: string;
  /** http status, when the server answered */
  readonly status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super("download", message, { cause: options.cause });
    this.name = "DownloadError";
    this.url = url;
    this.status = options.status;
  }
}

export type ExternalCommandDetails = {
  command: string;
  args: string[];
  /** process exit status (null when killed by a signal or never spawned) */
  exitCode: number | null;
  signal?: NodeJS.Signals | null;
  /** tail of captured stderr */
  stderr?: string;
  cause?: unknown;
};

/** A shell, container or machine command failed. */
export class ExternalCommandError extends HearthError {
  readonly command: string;
  readonly args: string[];
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderr: string;

  constructor(details: ExternalCommandDetails, code: HearthErrorCode = "external_command") {
    super(code, formatCommandFailure(details), { cause: details.cause });
    this.name = "ExternalCommandError";
    this.command = details.command;
    this.args = details.args;
    this.exitCode = details.exitCode;
    this.signal = details.signal ?? null;
    this.stderr = details.stderr ?? "";
  }
}

/**
 * The container runtime itself failed to run a command inside the container
 * (as opposed to the command exiting non-zero).
 */
export class ContainerExecError extends ExternalCommandError {
  /** container name */
  readonly container: string;

  constructor(container: string, details: ExternalCommandDetails) {
    super(details, "container_exec");
    this.name = "ContainerExecError";
    this.container = container;
  }
}

/** Patch operations invoked out of order. */
export class StaleWorkflowError extends HearthError {
  constructor(message: string) {
    super("stale_workflow", message);
    this.name = "StaleWorkflowError";
  }
}

export class NotFetchedError extends StaleWorkflowError {
  readonly recipeId: string;

  constructor(recipeId: string) {
    super(`Recipe sources were not fetched yet: ${recipeId} (run 'hearth build --recipe=${recipeId}' first)`);
    this.name = "NotFetchedError";
    this.recipeId = recipeId;
  }
}

export class MissingWorkdirError extends StaleWorkflowError {
  readonly workdir: string;

  constructor(recipeId: string, workdir: string) {
    super(`No workdir found at ${workdir} (run 'hearth make-patch --recipe=${recipeId}' first)`);
    this.name = "MissingWorkdirError";
    this.workdir = workdir;
  }
}

function formatCommandFailure(details: ExternalCommandDetails): string {
  const line = [details.command, ...details.args].join(" ");
  let status: string;
  if (details.exitCode !== null) {
    status = `exit ${details.exitCode}`;
  } else if (details.signal) {
    status = `signal ${details.signal}`;
  } else {
    const reason = details.cause instanceof Error ? details.cause.message : "did not start";
    status = reason;
  }
  const stderr = details.stderr?.trim();
  return `Command failed (${status}): ${line}` + (stderr ? `\n${stderr}` : "");
}
