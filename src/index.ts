/**
 * hearth
 *
 * Fetch, build and package third-party recipes inside a reproducible
 * container, with per-recipe completion state kept in a local cache.
 */

// Recipes and cache
export {
  parseRecipe,
  readRecipeFile,
  loadRecipe,
  listRecipeIds,
  recipePath,
  isValidRecipeId,
  type Recipe,
  type RecipeSource,
  type RecipeSteps,
  type SourceMethod,
} from "./recipe";
export {
  CacheStore,
  RECIPE_STAGES,
  type RecipeStage,
  type RecipeStatus,
} from "./cache-store";
export {
  parseChecksum,
  computeDigest,
  verifyIntegrity,
  type Checksum,
  type VerifyResult,
} from "./integrity";

// Stages
export { fetchRecipe, type FetchStageOptions } from "./fetch-stage";
export { buildRecipe, packageRecipe, type StageOptions } from "./build-stage";
export { RecipePipeline, type PipelineOptions } from "./pipeline";
export {
  downloadFile,
  archiveFileName,
  type DownloadFetch,
  type DownloadOptions,
  type DownloadResponse,
} from "./download";
export { extractArchive, flattenInto, parseTar, type TarEntry } from "./archive";

// Isolation environment
export {
  IsolationEnvironment,
  MachineManager,
  ContainerManager,
  reentryCommand,
  type EnvironmentKind,
  type EnvironmentState,
  type StateChange,
  type IsolationEnvironmentOptions,
} from "./environment";
export { IMAGES, DEFAULT_IMAGE, imageRegistry, resolveImage, type Image } from "./images";
export { withRetry, type RetryPolicy } from "./retry";
export {
  ChildProcessRunner,
  shellQuote,
  shellJoin,
  type CommandRunner,
  type CaptureResult,
  type RunOptions,
} from "./process";

// Patches
export {
  diffTrees,
  makePatch,
  savePatch,
  workdirPath,
  patchFilePath,
  type PatchOptions,
  type SavePatchOptions,
  type SavePatchResult,
} from "./patch";

// Configuration, logging and errors
export {
  resolveContext,
  parseConfig,
  envOverrides,
  containerEnv,
  containerPath,
  CONFIG_FILE,
  DEFAULT_CONFIG,
  type HearthConfig,
  type HearthContext,
  type ConfigOverrides,
} from "./config";
export {
  parseDebugEnv,
  resolveDebugFlags,
  createDebugLogger,
  type DebugFlag,
  type DebugConfig,
  type DebugLogFn,
} from "./debug";
export { createTerminalReporter, silentReporter, type Reporter } from "./progress";
export {
  HearthError,
  UsageError,
  ConfigurationError,
  RecipeParseError,
  IntegrityError,
  UnsupportedMethodError,
  DownloadError,
  ExternalCommandError,
  ContainerExecError,
  StaleWorkflowError,
  NotFetchedError,
  MissingWorkdirError,
  type HearthErrorCode,
} from "./errors";
