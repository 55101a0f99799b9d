import type { CacheStore } from "./cache-store";
import { noopDebugLog, type DebugLogFn } from "./debug";
import { NotFetchedError } from "./errors";
import { copyTree } from "./fs-utils";
import type { CommandRunner } from "./process";
import { silentReporter, type Reporter } from "./progress";
import type { Recipe } from "./recipe";

export type StageOptions = {
  cache: CacheStore;
  runner: CommandRunner;
  reporter?: Reporter;
  debug?: DebugLogFn;
  /** suppress the output of build and package steps */
  quiet?: boolean;
};

async function runSteps(
  recipe: Recipe,
  steps: readonly string[],
  options: StageOptions,
): Promise<void> {
  const debug = options.debug ?? noopDebugLog;
  const cwd = options.cache.buildDir(recipe.id);
  for (const step of steps) {
    debug("build", `${recipe.id}: $ ${step}`);
    await options.runner.run("/bin/sh", ["-c", step], { cwd, quiet: options.quiet });
  }
}

function prepareBuildDir(recipe: Recipe, options: StageOptions): void {
  const { cache } = options;
  if (!cache.isFetched(recipe.id)) {
    throw new NotFetchedError(recipe.id);
  }
  copyTree(cache.sourceDir(recipe.id), cache.buildDir(recipe.id));
}

/**
 * Run the build steps unless `builds/<id>.built` exists.
 *
 * Returns `true` when the steps ran. The marker is written only after every
 * step exited 0.
 */
export async function buildRecipe(recipe: Recipe, options: StageOptions): Promise<boolean> {
  const { cache } = options;
  const reporter = options.reporter ?? silentReporter;

  if (cache.isBuilt(recipe.id)) {
    return false;
  }

  reporter.progress(`Building recipe '${recipe.id}'`);
  prepareBuildDir(recipe, options);
  await runSteps(recipe, recipe.steps.build, options);
  cache.markBuilt(recipe.id);
  reporter.done();
  return true;
}

/** Run the package steps. Not gated by a marker: every call packages again. */
export async function packageRecipe(recipe: Recipe, options: StageOptions): Promise<void> {
  const reporter = options.reporter ?? silentReporter;

  reporter.progress(`Packaging recipe '${recipe.id}'`);
  prepareBuildDir(recipe, options);
  await runSteps(recipe, recipe.steps.package, options);
  options.cache.writeStatus(recipe.id, "packaged");
  reporter.done();
}
