import fs from "fs";
import path from "path";

import {
  DEBUG_FLAGS,
  debugFlagsToArray,
  parseDebugEnv,
  resolveDebugFlags,
  type DebugConfig,
  type DebugFlag,
} from "./debug";
import { ConfigurationError } from "./errors";
import { DEFAULT_IMAGE, imageRegistry, resolveImage, type Image } from "./images";
import { isRecord } from "./json";

export const CONFIG_FILE = "hearth.config.json";

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export type HearthConfig = {
  /** container name; the machine is `<environmentName>-machine` */
  environmentName: string;
  /** image registry key */
  image: string;
  /** podman-compatible runtime binary */
  runtime: string;
  /** cache root (relative paths resolve against the workspace) */
  cacheDir: string;
  /** recipe directory (relative paths resolve against the workspace) */
  recipesDir: string;
  /** where the workspace is mounted inside the container */
  mountPath: string;
  /** command that runs hearth inside the container */
  entrypoint: string;
  /** extra or overriding image definitions */
  images: Record<string, Image>;
  debug?: DebugConfig;
};

export type ConfigOverrides = Partial<HearthConfig>;

export const DEFAULT_CONFIG: Readonly<HearthConfig> = Object.freeze({
  environmentName: "hearth-default",
  image: DEFAULT_IMAGE,
  runtime: "podman",
  cacheDir: path.join(".hearth", "cache"),
  recipesDir: "recipes",
  mountPath: "/hearth",
  entrypoint: "npx --no-install hearth",
  images: {},
});

/** Resolved, immutable settings shared by every component of one run. */
export type HearthContext = Readonly<{
  workspace: string;
  environmentName: string;
  containerName: string;
  machineName: string;
  imageName: string;
  image: Readonly<Image>;
  images: Readonly<Record<string, Image>>;
  runtime: string;
  cacheDir: string;
  recipesDir: string;
  mountPath: string;
  entrypoint: string;
  debugFlags: readonly DebugFlag[];
  platform: NodeJS.Platform;
}>;

const STRING_KEYS = [
  "environmentName",
  "image",
  "runtime",
  "cacheDir",
  "recipesDir",
  "mountPath",
  "entrypoint",
] as const;

function invalid(where: string, message: string): ConfigurationError {
  return new ConfigurationError(`invalid config ${where}: ${message}`);
}

function parseImages(raw: unknown, where: string): Record<string, Image> {
  if (!isRecord(raw)) {
    throw invalid(where, "images: expected object");
  }
  const images: Record<string, Image> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (!isRecord(value) || typeof value.id !== "string" || value.id.length === 0) {
      throw invalid(where, `images.${name}.id: expected non-empty string`);
    }
    const setup = value.setup ?? [];
    if (!Array.isArray(setup) || !setup.every((cmd): cmd is string => typeof cmd === "string")) {
      throw invalid(where, `images.${name}.setup: expected array of strings`);
    }
    images[name] = { id: value.id, setup };
  }
  return images;
}

function parseDebug(raw: unknown, where: string): DebugConfig {
  if (typeof raw === "boolean") return raw;
  if (!Array.isArray(raw)) {
    throw invalid(where, "debug: expected boolean or array of flags");
  }
  const flags: DebugFlag[] = [];
  for (const entry of raw) {
    const flag = DEBUG_FLAGS.find((candidate) => candidate === entry);
    if (!flag) {
      throw invalid(where, `debug: unknown flag ${JSON.stringify(entry)}`);
    }
    flags.push(flag);
  }
  return flags;
}

/** Validate the contents of a `hearth.config.json`. */
export function parseConfig(raw: unknown, where = CONFIG_FILE): ConfigOverrides {
  if (!isRecord(raw)) {
    throw invalid(where, "expected object");
  }

  const config: ConfigOverrides = {};
  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "string" || value.length === 0) {
      throw invalid(where, `${key}: expected non-empty string`);
    }
    config[key] = value;
  }
  if (raw.images !== undefined) {
    config.images = parseImages(raw.images, where);
  }
  if (raw.debug !== undefined) {
    config.debug = parseDebug(raw.debug, where);
  }
  return config;
}

export function readConfigFile(filePath: string): ConfigOverrides {
  if (!fs.existsSync(filePath)) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw invalid(filePath, message);
  }
  return parseConfig(raw, filePath);
}

/** `HEARTH_*` environment overrides (`HEARTH_DEBUG` is handled separately). */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  const mapping: Array<[string, (typeof STRING_KEYS)[number]]> = [
    ["HEARTH_ENV_NAME", "environmentName"],
    ["HEARTH_IMAGE", "image"],
    ["HEARTH_RUNTIME", "runtime"],
    ["HEARTH_CACHE_DIR", "cacheDir"],
    ["HEARTH_RECIPES_DIR", "recipesDir"],
    ["HEARTH_ENTRYPOINT", "entrypoint"],
  ];
  for (const [name, key] of mapping) {
    const value = env[name]?.trim();
    if (value) overrides[key] = value;
  }
  return overrides;
}

function mergeConfig(base: HearthConfig, ...layers: ConfigOverrides[]): HearthConfig {
  const merged: HearthConfig = { ...base, images: { ...base.images } };
  for (const layer of layers) {
    for (const key of STRING_KEYS) {
      const value = layer[key];
      if (value !== undefined) merged[key] = value;
    }
    if (layer.images) merged.images = { ...merged.images, ...layer.images };
    if (layer.debug !== undefined) merged.debug = layer.debug;
  }
  return merged;
}

export type ResolveContextOptions = {
  /** workspace root (default: cwd) */
  workspace?: string;
  env?: NodeJS.ProcessEnv;
  /** highest-precedence overrides, usually from command-line flags */
  overrides?: ConfigOverrides;
  platform?: NodeJS.Platform;
};

/**
 * Build the run context: defaults, then `hearth.config.json`, then `HEARTH_*`
 * variables, then `overrides`.
 */
export function resolveContext(options: ResolveContextOptions = {}): HearthContext {
  const workspace = path.resolve(options.workspace ?? process.cwd());
  const env = options.env ?? process.env;

  const config = mergeConfig(
    DEFAULT_CONFIG,
    readConfigFile(path.join(workspace, CONFIG_FILE)),
    envOverrides(env),
    options.overrides ?? {},
  );

  if (!NAME_PATTERN.test(config.environmentName)) {
    throw new ConfigurationError(
      `Invalid environment name '${config.environmentName}' (letters, numbers, '_', '.', '-')`,
    );
  }
  if (!path.posix.isAbsolute(config.mountPath)) {
    throw new ConfigurationError(`Mount path must be absolute: ${config.mountPath}`);
  }

  const images = Object.freeze(imageRegistry(config.images));
  const image = resolveImage(config.image, images);
  const debugFlags = resolveDebugFlags(config.debug, parseDebugEnv(env.HEARTH_DEBUG ?? ""));

  return Object.freeze({
    workspace,
    environmentName: config.environmentName,
    containerName: config.environmentName,
    machineName: `${config.environmentName}-machine`,
    imageName: config.image,
    image,
    images,
    runtime: config.runtime,
    cacheDir: path.resolve(workspace, config.cacheDir),
    recipesDir: path.resolve(workspace, config.recipesDir),
    mountPath: config.mountPath,
    entrypoint: config.entrypoint,
    debugFlags: Object.freeze(debugFlagsToArray(debugFlags)),
    platform: options.platform ?? process.platform,
  });
}

/** Where a workspace path appears inside the container. */
export function containerPath(context: HearthContext, hostPath: string, label: string): string {
  const relative = path.relative(context.workspace, hostPath);
  if (relative === "") return context.mountPath;
  if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new ConfigurationError(
      `${label} ${hostPath} is outside the workspace ${context.workspace} and is not visible inside the container`,
    );
  }
  return path.posix.join(context.mountPath, ...relative.split(path.sep));
}

/**
 * `HEARTH_*` variables that reproduce this context for a run inside the
 * container, with paths rewritten under the mount point.
 */
export function containerEnv(context: HearthContext): Record<string, string> {
  const env: Record<string, string> = {
    HEARTH_CACHE_DIR: containerPath(context, context.cacheDir, "Cache directory"),
    HEARTH_RECIPES_DIR: containerPath(context, context.recipesDir, "Recipes directory"),
  };
  if (context.debugFlags.length > 0) {
    env.HEARTH_DEBUG = context.debugFlags.join(",");
  }
  return env;
}
