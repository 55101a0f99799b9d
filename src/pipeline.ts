import { buildRecipe, packageRecipe, type StageOptions } from "./build-stage";
import type { CacheStore } from "./cache-store";
import type { DebugLogFn } from "./debug";
import type { DownloadFetch } from "./download";
import { fetchRecipe } from "./fetch-stage";
import type { CommandRunner } from "./process";
import { silentReporter, type Reporter } from "./progress";
import { loadRecipe, type Recipe } from "./recipe";

export type PipelineOptions = {
  cache: CacheStore;
  runner: CommandRunner;
  /** directory holding `<id>.json` recipe files */
  recipesDir: string;
  reporter?: Reporter;
  debug?: DebugLogFn;
  fetch?: DownloadFetch;
  quiet?: boolean;
};

/**
 * Fetch, build and package recipes against one cache.
 *
 * Every stage is gated by the cache so calling {@link RecipePipeline.run}
 * repeatedly only does the missing work.
 */
export class RecipePipeline {
  private readonly reporter: Reporter;

  constructor(private readonly options: PipelineOptions) {
    this.reporter = options.reporter ?? silentReporter;
  }

  get cache(): CacheStore {
    return this.options.cache;
  }

  load(id: string): Recipe {
    return loadRecipe(this.options.recipesDir, id);
  }

  fetch(recipe: Recipe): Promise<boolean> {
    return fetchRecipe(recipe, {
      cache: this.options.cache,
      reporter: this.reporter,
      debug: this.options.debug,
      fetch: this.options.fetch,
    });
  }

  build(recipe: Recipe): Promise<boolean> {
    return buildRecipe(recipe, this.stageOptions());
  }

  package(recipe: Recipe): Promise<void> {
    return packageRecipe(recipe, this.stageOptions());
  }

  /** fetch → build → package (packaging only when the build did work) */
  async run(recipe: Recipe): Promise<boolean> {
    await this.fetch(recipe);
    const built = await this.build(recipe);
    if (built) {
      await this.package(recipe);
    }
    return built;
  }

  async rebuild(recipe: Recipe): Promise<boolean> {
    this.options.cache.clearBuilt(recipe.id);
    return this.run(recipe);
  }

  /**
   * Run every recipe in order. Built recipes are reported and skipped; the
   * first failure stops the sweep.
   */
  async runAll(ids: readonly string[]): Promise<string[]> {
    const built: string[] = [];
    for (const id of ids) {
      if (this.options.cache.isBuilt(id)) {
        this.reporter.info(`${id}: no work to do`);
        continue;
      }
      if (await this.run(this.load(id))) {
        built.push(id);
      }
    }
    return built;
  }

  private stageOptions(): StageOptions {
    return {
      cache: this.options.cache,
      runner: this.options.runner,
      reporter: this.reporter,
      debug: this.options.debug,
      quiet: this.options.quiet,
    };
  }
}
