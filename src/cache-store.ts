import fs from "fs";
import path from "path";

import { removeTree, writeFileAtomic } from "./fs-utils";
import { isRecord } from "./json";

const STATUS_SCHEMA_VERSION = 1 as const;

export const RECIPE_STAGES = ["not-fetched", "fetching", "fetched", "built", "packaged"] as const;

/** per-recipe progress through the pipeline */
export type RecipeStage = (typeof RECIPE_STAGES)[number];

/** persisted status record (`state/<id>.json`) */
export type RecipeStatus = {
  /** status schema version */
  version: typeof STATUS_SCHEMA_VERSION;
  /** recipe id */
  id: string;
  stage: RecipeStage;
  /** last update timestamp (iso 8601) */
  updatedAt: string;
};

function isRecipeStage(value: unknown): value is RecipeStage {
  return typeof value === "string" && RECIPE_STAGES.some((stage) => stage === value);
}

/**
 * On-disk cache of extracted sources and build trees.
 *
 * ```
 * <root>/sources/<id>/         pristine extracted tree
 * <root>/sources/<id>-clean/   reference copy for patches
 * <root>/builds/<id>/          build/package working tree
 * <root>/builds/<id>.built     zero-byte completion marker
 * <root>/state/<id>.json       status record
 * ```
 *
 * No locking: one process at a time.
 */
export class CacheStore {
  readonly sourcesDir: string;
  readonly buildsDir: string;
  readonly stateDir: string;

  constructor(readonly root: string) {
    this.sourcesDir = path.join(root, "sources");
    this.buildsDir = path.join(root, "builds");
    this.stateDir = path.join(root, "state");
  }

  sourceDir(id: string): string {
    return path.join(this.sourcesDir, id);
  }

  cleanSourceDir(id: string): string {
    return path.join(this.sourcesDir, `${id}-clean`);
  }

  buildDir(id: string): string {
    return path.join(this.buildsDir, id);
  }

  builtMarkerPath(id: string): string {
    return path.join(this.buildsDir, `${id}.built`);
  }

  statusPath(id: string): string {
    return path.join(this.stateDir, `${id}.json`);
  }

  isFetched(id: string): boolean {
    if (!fs.existsSync(this.sourceDir(id))) return false;
    return this.readStatus(id)?.stage !== "fetching";
  }

  /** The marker is the only source of truth for "built". */
  isBuilt(id: string): boolean {
    return fs.existsSync(this.builtMarkerPath(id));
  }

  markBuilt(id: string): void {
    writeFileAtomic(this.builtMarkerPath(id), "");
    this.writeStatus(id, "built");
  }

  clearBuilt(id: string): void {
    fs.rmSync(this.builtMarkerPath(id), { force: true });
    if (this.isFetched(id)) {
      this.writeStatus(id, "fetched");
    }
  }

  /** Remove both source trees so the next fetch starts over. */
  discardSources(id: string): void {
    removeTree(this.sourceDir(id));
    removeTree(this.cleanSourceDir(id));
  }

  readStatus(id: string): RecipeStatus | null {
    let text: string;
    try {
      text = fs.readFileSync(this.statusPath(id), "utf8");
    } catch {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      return null;
    }
    if (!isRecord(raw) || raw.version !== STATUS_SCHEMA_VERSION || !isRecipeStage(raw.stage)) {
      return null;
    }
    return {
      version: STATUS_SCHEMA_VERSION,
      id,
      stage: raw.stage,
      updatedAt: typeof raw.updatedAt === "string" ? raw.updatedAt : "",
    };
  }

  writeStatus(id: string, stage: RecipeStage): RecipeStatus {
    const status: RecipeStatus = {
      version: STATUS_SCHEMA_VERSION,
      id,
      stage,
      updatedAt: new Date().toISOString(),
    };
    writeFileAtomic(this.statusPath(id), JSON.stringify(status, null, 2) + "\n");
    return status;
  }

  /**
   * Current stage of a recipe.
   *
   * The marker files win over the status record: a removed `.built` marker
   * means "not built" whatever the record says.
   */
  statusOf(id: string): RecipeStage {
    const recorded = this.readStatus(id)?.stage;
    if (recorded === "fetching") return "fetching";
    if (!fs.existsSync(this.sourceDir(id))) return "not-fetched";
    if (!this.isBuilt(id)) return "fetched";
    return recorded === "packaged" ? "packaged" : "built";
  }

  ensureLayout(): void {
    fs.mkdirSync(this.sourcesDir, { recursive: true });
    fs.mkdirSync(this.buildsDir, { recursive: true });
  }
}
