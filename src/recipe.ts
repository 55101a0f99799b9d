import fs from "fs";
import path from "path";

import { ConfigurationError, RecipeParseError } from "./errors";
import { isRecord } from "./json";

export const RECIPE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._+-]*$/;
const CHECKSUM_PATTERN = /^[A-Za-z0-9_-]+:[0-9A-Fa-f]+$/;

/** how sources are retrieved; only tarballs over http(s) are implemented */
export type SourceMethod = "tarball";

export type RecipeSource = {
  /** archive url */
  url: string;
  /**
   * retrieval method as written in the recipe file
   *
   * Checked against {@link SourceMethod} when the recipe is fetched.
   */
  method: SourceMethod | (string & {});
  /** expected digest as `algorithm:hexdigest` */
  checksum?: string;
};

export type RecipeSteps = {
  /** shell lines run in order to build */
  build: string[];
  /** shell lines run in order to package */
  package: string[];
};

export type Recipe = {
  /** unique id; cache key and directory name */
  id: string;
  source: RecipeSource;
  steps: RecipeSteps;
};

function expectString(value: unknown, where: string, field: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new RecipeParseError(where, `${field}: expected non-empty string`);
  }
  return value;
}

function expectStringList(value: unknown, where: string, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new RecipeParseError(where, `${field}: expected array of strings`);
  }
  return value.map((entry, index) => {
    if (typeof entry !== "string") {
      throw new RecipeParseError(where, `${field}[${index}]: expected string`);
    }
    return entry;
  });
}

export function isValidRecipeId(id: string): boolean {
  return RECIPE_ID_PATTERN.test(id);
}

/** Map an untyped JSON tree onto {@link Recipe}. */
export function parseRecipe(raw: unknown, where = "<recipe>"): Recipe {
  if (!isRecord(raw)) {
    throw new RecipeParseError(where, "expected object");
  }

  const id = expectString(raw.id, where, "id");
  if (!isValidRecipeId(id)) {
    throw new RecipeParseError(
      where,
      `id: '${id}' may only contain letters, numbers, '.', '_', '+', '-'`,
    );
  }

  if (!isRecord(raw.source)) {
    throw new RecipeParseError(where, "source: expected object");
  }
  const url = expectString(raw.source.url, where, "source.url");
  const method = expectString(raw.source.method, where, "source.method");

  const source: RecipeSource = { url, method };
  if (raw.source.checksum !== undefined && raw.source.checksum !== null) {
    const checksum = expectString(raw.source.checksum, where, "source.checksum");
    if (!CHECKSUM_PATTERN.test(checksum)) {
      throw new RecipeParseError(where, "source.checksum: expected 'algorithm:hexdigest'");
    }
    source.checksum = checksum;
  }

  if (!isRecord(raw.steps)) {
    throw new RecipeParseError(where, "steps: expected object");
  }

  return {
    id,
    source,
    steps: {
      build: expectStringList(raw.steps.build, where, "steps.build"),
      package: expectStringList(raw.steps.package, where, "steps.package"),
    },
  };
}

export function readRecipeFile(filePath: string): Recipe {
  const text = fs.readFileSync(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RecipeParseError(filePath, message);
  }
  return parseRecipe(raw, filePath);
}

export function recipePath(recipesDir: string, id: string): string {
  return path.join(recipesDir, `${id}.json`);
}

/** Load `<recipesDir>/<id>.json`, checking that the file declares the same id. */
export function loadRecipe(recipesDir: string, id: string): Recipe {
  if (!isValidRecipeId(id)) {
    throw new ConfigurationError(`No such recipe: ${id}`);
  }
  const filePath = recipePath(recipesDir, id);
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`No such recipe: ${id}`);
  }

  const recipe = readRecipeFile(filePath);
  if (recipe.id !== id) {
    throw new ConfigurationError(
      `Recipe file ${filePath} declares id '${recipe.id}' (expected '${id}')`,
    );
  }
  return recipe;
}

/** Recipe ids discovered by file name, sorted. */
export function listRecipeIds(recipesDir: string): string[] {
  if (!fs.existsSync(recipesDir) || !fs.statSync(recipesDir).isDirectory()) {
    throw new ConfigurationError(`No 'recipes' directory at ${recipesDir}`);
  }

  return fs
    .readdirSync(recipesDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".json"))
    .map((entry) => entry.name.slice(0, -".json".length))
    .filter(isValidRecipeId)
    .sort();
}
