export const DEBUG_FLAGS = ["env", "fetch", "build", "patch", "exec"] as const;

export type DebugFlag = (typeof DEBUG_FLAGS)[number];

/** component name attached to debug messages */
export type DebugComponent = DebugFlag;

/**
 * Debug selection.
 *
 * - `true`: enable all debug components
 * - `false`: disable all debug components
 * - `DebugFlag[]`: enable the listed components (merged with `HEARTH_DEBUG`)
 */
export type DebugConfig = boolean | DebugFlag[];

export type DebugLogFn = (component: DebugComponent, message: string) => void;

function isDebugFlag(value: string): value is DebugFlag {
  return DEBUG_FLAGS.some((flag) => flag === value);
}

/** Parse `HEARTH_DEBUG` (`fetch,exec`, or `1`/`true`/`all`). */
export function parseDebugEnv(value = process.env.HEARTH_DEBUG): Set<DebugFlag> {
  const flags = new Set<DebugFlag>();
  if (!value) return flags;

  for (const raw of value.split(",")) {
    const entry = raw.trim().toLowerCase();
    if (!entry) continue;
    if (entry === "1" || entry === "true" || entry === "all") {
      for (const flag of DEBUG_FLAGS) flags.add(flag);
      continue;
    }
    if (isDebugFlag(entry)) flags.add(entry);
  }
  return flags;
}

export function resolveDebugFlags(
  config: DebugConfig | undefined,
  envFlags: ReadonlySet<DebugFlag> = parseDebugEnv(),
): Set<DebugFlag> {
  if (config === true) return new Set(DEBUG_FLAGS);
  if (config === false) return new Set();
  const flags = new Set(envFlags);
  for (const flag of config ?? []) flags.add(flag);
  return flags;
}

export function debugFlagsToArray(flags: ReadonlySet<DebugFlag>): DebugFlag[] {
  return DEBUG_FLAGS.filter((flag) => flags.has(flag));
}

export function stripTrailingNewline(message: string): string {
  return message.endsWith("\n") ? message.slice(0, -1) : message;
}

export const defaultDebugLog: DebugLogFn = (component, message) => {
  process.stderr.write(`[${component}] ${stripTrailingNewline(message)}\n`);
};

/** Logger that drops messages for components that are not enabled. */
export function createDebugLogger(
  flags: ReadonlySet<DebugFlag>,
  sink: DebugLogFn | null = defaultDebugLog,
): DebugLogFn {
  return (component, message) => {
    if (!sink || !flags.has(component)) return;
    sink(component, stripTrailingNewline(message));
  };
}

export const noopDebugLog: DebugLogFn = () => {};
