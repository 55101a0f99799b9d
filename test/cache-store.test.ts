import assert from "node:assert/strict";
import fs from "fs";
import path from "path";
import test from "node:test";

import { CacheStore } from "../src/cache-store";
import { tempDir } from "./helpers/fixtures";

test("cache-store: layout paths", () => {
  const cache = new CacheStore("/c");
  assert.equal(cache.sourceDir("zlib"), path.join("/c", "sources", "zlib"));
  assert.equal(cache.cleanSourceDir("zlib"), path.join("/c", "sources", "zlib-clean"));
  assert.equal(cache.buildDir("zlib"), path.join("/c", "builds", "zlib"));
  assert.equal(cache.builtMarkerPath("zlib"), path.join("/c", "builds", "zlib.built"));
  assert.equal(cache.statusPath("zlib"), path.join("/c", "state", "zlib.json"));
});

test("cache-store: fetched means the source directory exists", (t) => {
  const cache = new CacheStore(tempDir(t));
  assert.equal(cache.isFetched("zlib"), false);
  fs.mkdirSync(cache.sourceDir("zlib"), { recursive: true });
  assert.equal(cache.isFetched("zlib"), true);
});

test("cache-store: an interrupted fetch does not count as fetched", (t) => {
  const cache = new CacheStore(tempDir(t));
  fs.mkdirSync(cache.sourceDir("zlib"), { recursive: true });
  cache.writeStatus("zlib", "fetching");

  assert.equal(cache.isFetched("zlib"), false);
  assert.equal(cache.statusOf("zlib"), "fetching");

  cache.discardSources("zlib");
  assert.equal(fs.existsSync(cache.sourceDir("zlib")), false);
});

test("cache-store: markBuilt writes an empty marker and clearBuilt removes it", (t) => {
  const cache = new CacheStore(tempDir(t));
  fs.mkdirSync(cache.sourceDir("zlib"), { recursive: true });

  cache.markBuilt("zlib");
  assert.equal(cache.isBuilt("zlib"), true);
  assert.equal(fs.readFileSync(cache.builtMarkerPath("zlib"), "utf8"), "");
  assert.equal(cache.readStatus("zlib")?.stage, "built");

  cache.clearBuilt("zlib");
  assert.equal(cache.isBuilt("zlib"), false);
  assert.equal(cache.readStatus("zlib")?.stage, "fetched");

  // clearing twice is fine
  cache.clearBuilt("zlib");
  assert.equal(cache.isBuilt("zlib"), false);
});

test("cache-store: the marker wins over the status record", (t) => {
  const cache = new CacheStore(tempDir(t));
  fs.mkdirSync(cache.sourceDir("zlib"), { recursive: true });
  cache.writeStatus("zlib", "packaged");
  assert.equal(cache.statusOf("zlib"), "fetched");

  cache.markBuilt("zlib");
  cache.writeStatus("zlib", "packaged");
  assert.equal(cache.statusOf("zlib"), "packaged");

  fs.rmSync(cache.builtMarkerPath("zlib"));
  assert.equal(cache.statusOf("zlib"), "fetched");
});

test("cache-store: statusOf without any state", (t) => {
  const cache = new CacheStore(tempDir(t));
  assert.equal(cache.statusOf("zlib"), "not-fetched");
});

test("cache-store: unreadable status records are ignored", (t) => {
  const cache = new CacheStore(tempDir(t));
  fs.mkdirSync(cache.stateDir, { recursive: true });
  fs.writeFileSync(cache.statusPath("zlib"), "{not json");
  assert.equal(cache.readStatus("zlib"), null);

  fs.writeFileSync(cache.statusPath("zlib"), JSON.stringify({ version: 1, stage: "bogus" }));
  assert.equal(cache.readStatus("zlib"), null);
});

test("cache-store: status records are written without leftovers", (t) => {
  const cache = new CacheStore(tempDir(t));
  const status = cache.writeStatus("zlib", "fetched");

  assert.deepEqual(JSON.parse(fs.readFileSync(cache.statusPath("zlib"), "utf8")), status);
  assert.deepEqual(fs.readdirSync(cache.stateDir), ["zlib.json"]);
});
