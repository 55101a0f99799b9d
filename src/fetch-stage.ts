import { once } from "events";
import fs from "fs";
import path from "path";

import { flattenInto, extractArchive } from "./archive";
import type { CacheStore } from "./cache-store";
import { noopDebugLog, type DebugLogFn } from "./debug";
import { downloadFile, type DownloadFetch } from "./download";
import { UnsupportedMethodError } from "./errors";
import { copyTree, removeTree } from "./fs-utils";
import { verifyIntegrity } from "./integrity";
import { silentReporter, type Reporter } from "./progress";
import type { Recipe } from "./recipe";

export type FetchStageOptions = {
  cache: CacheStore;
  reporter?: Reporter;
  debug?: DebugLogFn;
  /** fetch implementation used for downloads */
  fetch?: DownloadFetch;
};

/**
 * Populate `sources/<id>` and `sources/<id>-clean` for a recipe.
 *
 * Returns `false` when the sources were already present.
 */
export async function fetchRecipe(recipe: Recipe, options: FetchStageOptions): Promise<boolean> {
  const { cache } = options;
  const reporter = options.reporter ?? silentReporter;
  const debug = options.debug ?? noopDebugLog;
  const { id, source } = recipe;

  if (cache.isFetched(id)) {
    debug("fetch", `${id}: sources already present`);
    return false;
  }

  if (cache.readStatus(id)?.stage === "fetching") {
    debug("fetch", `${id}: discarding sources of an interrupted fetch`);
    cache.discardSources(id);
  }

  if (source.method !== "tarball") {
    throw new UnsupportedMethodError(source.method);
  }

  reporter.progress(`Fetching recipe '${id}'`);
  cache.ensureLayout();

  const tmpDir = fs.mkdtempSync(path.join(cache.root, `.fetch-${id}-`));
  try {
    const archivePath = await downloadFile(source.url, tmpDir, {
      fetch: options.fetch,
      onStart: (totalBytes) =>
        debug("fetch", `${id}: GET ${source.url} (${totalBytes ?? "unknown"} bytes)`),
    });

    const opened: fs.ReadStream[] = [];
    try {
      await verifyIntegrity(
        () => {
          const stream = fs.createReadStream(archivePath);
          opened.push(stream);
          return stream;
        },
        source.checksum,
        { label: id, warn: (message) => reporter.warn(message) },
      );
    } finally {
      for (const stream of opened) await closeStream(stream);
    }

    // from here until the snapshot exists the cache is inconsistent
    cache.writeStatus(id, "fetching");

    const extractDir = path.join(tmpDir, "extract");
    extractArchive(archivePath, extractDir);
    flattenInto(extractDir, cache.sourceDir(id));
  } finally {
    removeTree(tmpDir);
  }

  copyTree(cache.sourceDir(id), cache.cleanSourceDir(id));
  cache.writeStatus(id, "fetched");
  debug("fetch", `${id}: extracted to ${cache.sourceDir(id)}`);
  reporter.done();
  return true;
}

/** The archive is deleted right after; the descriptor must be closed first. */
async function closeStream(stream: fs.ReadStream): Promise<void> {
  if (stream.closed) return;
  const closed = once(stream, "close");
  stream.destroy();
  await closed;
}
