import { CacheStore, type RecipeStage } from "./cache-store";
import type { CliCommand } from "./cli";
import { containerEnv, type HearthContext } from "./config";
import { createDebugLogger, type DebugLogFn } from "./debug";
import type { DownloadFetch } from "./download";
import { IsolationEnvironment } from "./environment";
import { makePatch, savePatch } from "./patch";
import { RecipePipeline } from "./pipeline";
import { ChildProcessRunner, type CommandRunner } from "./process";
import { createTerminalReporter, type Reporter } from "./progress";
import { createTerminalConfirm, type ConfirmFn } from "./prompt";
import { listRecipeIds, loadRecipe } from "./recipe";

/** Everything a command needs; tests swap in fakes. */
export type CommandDeps = {
  context: HearthContext;
  runner: CommandRunner;
  reporter: Reporter;
  debug: DebugLogFn;
  confirm: ConfirmFn;
  fetch?: DownloadFetch;
  environment?: IsolationEnvironment;
};

export function createDefaultDeps(context: HearthContext): CommandDeps {
  return {
    context,
    runner: new ChildProcessRunner(),
    reporter: createTerminalReporter(),
    debug: createDebugLogger(new Set(context.debugFlags)),
    confirm: createTerminalConfirm(),
  };
}

export function createEnvironment(deps: CommandDeps): IsolationEnvironment {
  if (deps.environment) return deps.environment;
  const { context } = deps;
  return new IsolationEnvironment({
    runtime: context.runtime,
    runner: deps.runner,
    workspace: context.workspace,
    machineName: context.machineName,
    containerName: context.containerName,
    mountPath: context.mountPath,
    image: context.image,
    entrypoint: context.entrypoint,
    platform: context.platform,
    reporter: deps.reporter,
    debug: deps.debug,
  });
}

function createPipeline(deps: CommandDeps, quiet: boolean): RecipePipeline {
  return new RecipePipeline({
    cache: new CacheStore(deps.context.cacheDir),
    runner: deps.runner,
    recipesDir: deps.context.recipesDir,
    reporter: deps.reporter,
    debug: deps.debug,
    fetch: deps.fetch,
    quiet,
  });
}

/** Make sure the environment exists, then run the same command inside it. */
async function runInContainer(deps: CommandDeps, args: string[]): Promise<void> {
  const env = containerEnv(deps.context);
  const environment = createEnvironment(deps);
  await environment.ensure();
  await environment.reenter(args, env);
}

export async function runInit(deps: CommandDeps): Promise<void> {
  await createEnvironment(deps).ensure();
  deps.reporter.info(
    `Environment '${deps.context.environmentName}' is ready (image: ${deps.context.imageName})`,
  );
}

type BuildFamilyOptions = { recipe: string; quiet: boolean; inContainer: boolean };

export async function runBuild(deps: CommandDeps, options: BuildFamilyOptions): Promise<void> {
  const cache = new CacheStore(deps.context.cacheDir);
  if (cache.isBuilt(options.recipe)) {
    deps.reporter.info("No work to do");
    return;
  }

  if (!options.inContainer) {
    loadRecipe(deps.context.recipesDir, options.recipe);
    await runInContainer(deps, ["build", `--recipe=${options.recipe}`, `--quiet=${options.quiet}`]);
    return;
  }

  const pipeline = createPipeline(deps, options.quiet);
  await pipeline.run(pipeline.load(options.recipe));
}

export async function runBuildAll(
  deps: CommandDeps,
  options: { quiet: boolean; inContainer: boolean },
): Promise<void> {
  if (!options.inContainer) {
    listRecipeIds(deps.context.recipesDir);
    await runInContainer(deps, ["build-all", `--quiet=${options.quiet}`]);
    return;
  }

  const pipeline = createPipeline(deps, options.quiet);
  await pipeline.runAll(listRecipeIds(deps.context.recipesDir));
}

export async function runRebuild(deps: CommandDeps, options: BuildFamilyOptions): Promise<void> {
  if (!options.inContainer) {
    loadRecipe(deps.context.recipesDir, options.recipe);
    await runInContainer(deps, ["rebuild", `--recipe=${options.recipe}`, `--quiet=${options.quiet}`]);
    return;
  }

  const pipeline = createPipeline(deps, options.quiet);
  await pipeline.rebuild(pipeline.load(options.recipe));
}

/** Fetch and build when needed, then always package. */
export async function runPackage(deps: CommandDeps, options: BuildFamilyOptions): Promise<void> {
  if (!options.inContainer) {
    loadRecipe(deps.context.recipesDir, options.recipe);
    await runInContainer(deps, ["package", `--recipe=${options.recipe}`, `--quiet=${options.quiet}`]);
    return;
  }

  const pipeline = createPipeline(deps, options.quiet);
  const recipe = pipeline.load(options.recipe);
  await pipeline.fetch(recipe);
  await pipeline.build(recipe);
  await pipeline.package(recipe);
}

export function runMakePatch(deps: CommandDeps, options: { recipe: string }): string {
  return makePatch(options.recipe, {
    cache: new CacheStore(deps.context.cacheDir),
    cwd: deps.context.workspace,
    reporter: deps.reporter,
    debug: deps.debug,
  });
}

export async function runSavePatch(
  deps: CommandDeps,
  options: { recipe: string; removeWorkdir?: boolean },
): Promise<void> {
  await savePatch(options.recipe, {
    cache: new CacheStore(deps.context.cacheDir),
    cwd: deps.context.workspace,
    reporter: deps.reporter,
    debug: deps.debug,
    confirm: deps.confirm,
    removeWorkdir: options.removeWorkdir,
  });
}

export type StatusRow = { id: string; stage: RecipeStage };

export function runStatus(deps: CommandDeps): StatusRow[] {
  const cache = new CacheStore(deps.context.cacheDir);
  const rows = listRecipeIds(deps.context.recipesDir).map((id) => ({
    id,
    stage: cache.statusOf(id),
  }));

  if (rows.length === 0) {
    deps.reporter.info(`No recipes in ${deps.context.recipesDir}`);
    return rows;
  }
  const width = Math.max(...rows.map((row) => row.id.length));
  for (const row of rows) {
    deps.reporter.info(`${row.id.padEnd(width)}  ${row.stage}`);
  }
  return rows;
}

/** Dispatch a parsed command (everything but `help`). */
export async function runCommand(
  deps: CommandDeps,
  command: Exclude<CliCommand, { name: "help" }>,
): Promise<void> {
  switch (command.name) {
    case "init":
      await runInit(deps);
      return;
    case "build":
      await runBuild(deps, command);
      return;
    case "build-all":
      await runBuildAll(deps, command);
      return;
    case "rebuild":
      await runRebuild(deps, command);
      return;
    case "package":
      await runPackage(deps, command);
      return;
    case "make-patch":
      runMakePatch(deps, command);
      return;
    case "save-patch":
      await runSavePatch(deps, command);
      return;
    case "status":
      runStatus(deps);
      return;
  }
}
