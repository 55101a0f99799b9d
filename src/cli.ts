import { ExternalCommandError, UsageError } from "./errors";
import { isErrnoException } from "./fs-utils";

export type CliCommand =
  | { name: "init"; image?: string }
  | { name: "build"; recipe: string; quiet: boolean; inContainer: boolean }
  | { name: "build-all"; quiet: boolean; inContainer: boolean }
  | { name: "rebuild"; recipe: string; quiet: boolean; inContainer: boolean }
  | { name: "package"; recipe: string; quiet: boolean; inContainer: boolean }
  | { name: "make-patch"; recipe: string }
  | { name: "save-patch"; recipe: string; removeWorkdir?: boolean }
  | { name: "status" }
  | { name: "help"; topic?: string };

export type CommandName = CliCommand["name"];

type CommandSpec = {
  summary: string;
  /** flag name → value placeholder (`null` for booleans) */
  flags: Record<string, string | null>;
};

const COMMANDS: Record<Exclude<CommandName, "help">, CommandSpec> = {
  init: {
    summary: "Create the build machine (if needed) and container",
    flags: { image: "NAME" },
  },
  build: {
    summary: "Fetch and build a recipe inside the container",
    flags: { recipe: "ID", quiet: null, "in-container": null },
  },
  "build-all": {
    summary: "Build every recipe that is not built yet",
    flags: { quiet: null, "in-container": null },
  },
  rebuild: {
    summary: "Forget the build marker of a recipe and build it again",
    flags: { recipe: "ID", quiet: null, "in-container": null },
  },
  package: {
    summary: "Run the package steps of a built recipe",
    flags: { recipe: "ID", quiet: null, "in-container": null },
  },
  "make-patch": {
    summary: "Copy the clean sources of a recipe into <ID>-workdir",
    flags: { recipe: "ID" },
  },
  "save-patch": {
    summary: "Write the changes made in <ID>-workdir to <ID>.patch",
    flags: { recipe: "ID", "remove-workdir": null },
  },
  status: {
    summary: "Show the stage of every recipe",
    flags: {},
  },
};

const FLAG_HELP: Record<string, string> = {
  image: "Image to create the container from",
  recipe: "Recipe id (file name in the recipes directory)",
  quiet: "Silence the output of build steps",
  "in-container": "Internal: already running inside the container",
  "remove-workdir": "Remove the workdir without asking",
};

function isCommandName(value: string): value is Exclude<CommandName, "help"> {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

/** Parse `true|false|1|0|yes|no`. */
export function parseBoolean(value: string, flag: string): boolean {
  switch (value.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new UsageError(`--${flag} expects true or false (got '${value}')`);
  }
}

const BOOLEAN_LITERAL = /^(true|false|1|0|yes|no)$/i;

/** Split `--name=value` / `--name value` flags; booleans may be bare. */
export function parseFlags(
  command: Exclude<CommandName, "help">,
  argv: readonly string[],
): Map<string, string> {
  const spec = COMMANDS[command].flags;
  const flags = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (!arg.startsWith("--")) {
      throw new UsageError(`Unexpected argument '${arg}' for '${command}'`, command);
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!Object.prototype.hasOwnProperty.call(spec, name)) {
      throw new UsageError(`Unknown option --${name} for '${command}'`, command);
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (spec[name] === null) {
      const next = argv[i + 1];
      if (next !== undefined && BOOLEAN_LITERAL.test(next)) {
        value = next;
        i++;
      } else {
        value = "true";
      }
    } else {
      const next = argv[++i];
      if (next === undefined || next.startsWith("--")) {
        throw new UsageError(`--${name} requires a value`, command);
      }
      value = next;
    }
    flags.set(name, value);
  }

  return flags;
}

function requireFlag(flags: Map<string, string>, name: string, command: CommandName): string {
  const value = flags.get(name);
  if (value === undefined || value.length === 0) {
    throw new UsageError(`--${name} is required for '${command}'`, command);
  }
  return value;
}

function booleanFlag(flags: Map<string, string>, name: string): boolean {
  const value = flags.get(name);
  return value === undefined ? false : parseBoolean(value, name);
}

/** Turn `process.argv.slice(2)` into a command. */
export function parseCommand(argv: readonly string[]): CliCommand {
  const [first, ...rest] = argv;
  if (first === undefined || first === "help" || first === "--help" || first === "-h") {
    return { name: "help", topic: first === "help" ? rest[0] : undefined };
  }
  if (!isCommandName(first)) {
    throw new UsageError(`Unknown command: ${first}`);
  }
  if (rest.includes("--help") || rest.includes("-h")) {
    return { name: "help", topic: first };
  }

  const flags = parseFlags(first, rest);
  switch (first) {
    case "init":
      return { name: "init", image: flags.get("image") };
    case "build":
    case "rebuild":
    case "package":
      return {
        name: first,
        recipe: requireFlag(flags, "recipe", first),
        quiet: booleanFlag(flags, "quiet"),
        inContainer: booleanFlag(flags, "in-container"),
      };
    case "build-all":
      return {
        name: "build-all",
        quiet: booleanFlag(flags, "quiet"),
        inContainer: booleanFlag(flags, "in-container"),
      };
    case "make-patch":
      return { name: "make-patch", recipe: requireFlag(flags, "recipe", first) };
    case "save-patch": {
      const remove = flags.get("remove-workdir");
      return {
        name: "save-patch",
        recipe: requireFlag(flags, "recipe", first),
        removeWorkdir: remove === undefined ? undefined : parseBoolean(remove, "remove-workdir"),
      };
    }
    case "status":
      return { name: "status" };
  }
}

/** Help text for the whole tool or one command. */
export function usage(topic?: string): string {
  if (topic !== undefined && isCommandName(topic)) {
    const spec = COMMANDS[topic];
    const lines = [`Usage: hearth ${topic} [options]`, "", `${spec.summary}.`];
    const flagNames = Object.keys(spec.flags).filter((name) => name !== "in-container");
    if (flagNames.length > 0) {
      lines.push("", "Options:");
      for (const name of flagNames) {
        const placeholder = spec.flags[name];
        const label = placeholder ? `--${name}=${placeholder}` : `--${name}[=BOOL]`;
        lines.push(`  ${label.padEnd(24)}${FLAG_HELP[name] ?? ""}`);
      }
    }
    return lines.join("\n") + "\n";
  }

  const lines = ["Usage: hearth <command> [options]", "", "Commands:"];
  for (const [name, spec] of Object.entries(COMMANDS)) {
    lines.push(`  ${name.padEnd(13)}${spec.summary}`);
  }
  lines.push(`  ${"help".padEnd(13)}Show this help`);
  lines.push("", "Run hearth <command> --help for command-specific flags.");
  return lines.join("\n") + "\n";
}

/** True when `err` (or a cause) is the container runtime failing to spawn. */
function isMissingRuntime(err: unknown, runtime: string): boolean {
  let current: unknown = err;
  while (current instanceof Error) {
    if (
      current instanceof ExternalCommandError &&
      current.exitCode === null &&
      current.command === runtime
    ) {
      const cause = current.cause;
      if (isErrnoException(cause) && cause.code === "ENOENT") return true;
    }
    current = current.cause;
  }
  return false;
}

/** Text printed on stderr for a failed command. */
export function formatCliError(
  err: unknown,
  runtime: string,
  platform: NodeJS.Platform = process.platform,
): string {
  if (err instanceof UsageError) {
    return `${err.message}\n${usage(err.command ?? undefined)}`;
  }

  if (isMissingRuntime(err, runtime)) {
    const install =
      platform === "darwin"
        ? "  brew install podman"
        : "  sudo apt install podman (or equivalent for your distro)";
    return [
      `Error: '${runtime}' not found.`,
      "Please install podman (or set HEARTH_RUNTIME) to build recipes.",
      install,
      "",
    ].join("\n");
  }

  const message = err instanceof Error ? err.message : String(err);
  return `${message}\n`;
}
