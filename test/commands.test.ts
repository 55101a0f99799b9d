import assert from "node:assert/strict";
import fs from "fs";
import path from "path";
import test, { type TestContext } from "node:test";

import { CacheStore } from "../src/cache-store";
import {
  runBuild,
  runBuildAll,
  runCommand,
  runInit,
  runPackage,
  runRebuild,
  runStatus,
  type CommandDeps,
} from "../src/commands";
import { resolveContext } from "../src/config";
import { ConfigurationError } from "../src/errors";
import {
  FakeRunner,
  buildTarGz,
  createFakeFetch,
  createRecordingReporter,
  makeRecipe,
  tempDir,
  writeRecipeFile,
  type RunnerCall,
  type ScriptedResult,
} from "./helpers/fixtures";

const tarball = buildTarGz([
  { name: "zlib-1.3/", type: "directory" },
  { name: "zlib-1.3/configure", content: "#!/bin/sh\n" },
]);

const REENTRY_PREFIX =
  "podman exec -e HEARTH_CACHE_DIR=/hearth/.hearth/cache -e HEARTH_RECIPES_DIR=/hearth/recipes " +
  "hearth-default /bin/sh -c cd /hearth && npx --no-install hearth";

function setup(
  t: TestContext,
  script: (call: RunnerCall) => ScriptedResult = () => ({}),
  platform: NodeJS.Platform = "linux",
  env: NodeJS.ProcessEnv = {},
) {
  const workspace = tempDir(t);
  const context = resolveContext({ workspace, env, platform });
  const runner = new FakeRunner(script);
  const reporter = createRecordingReporter();
  const fetch = createFakeFetch(tarball);
  const questions: string[] = [];
  const deps: CommandDeps = {
    context,
    runner,
    reporter,
    fetch,
    debug: () => {},
    confirm: async (question) => {
      questions.push(question);
      return true;
    },
  };
  const cache = new CacheStore(context.cacheDir);
  return { workspace, context, runner, reporter, fetch, deps, cache, questions };
}

function addRecipe(recipesDir: string, id: string) {
  writeRecipeFile(recipesDir, makeRecipe({ id, steps: { build: ["make"], package: [] } }));
}

test("commands: init reports the ready environment", async (t) => {
  const { deps, runner, reporter } = setup(t);
  await runInit(deps);

  assert.deepEqual(runner.lines(), ["podman container exists hearth-default"]);
  assert.deepEqual(reporter.events, ["info:Environment 'hearth-default' is ready (image: debian)"]);
});

test("commands: build outside the container re-enters with the same command", async (t) => {
  const { deps, runner, context, fetch } = setup(t);
  addRecipe(context.recipesDir, "zlib");

  await runBuild(deps, { recipe: "zlib", quiet: true, inContainer: false });

  assert.deepEqual(runner.lines(), [
    "podman container exists hearth-default",
    `${REENTRY_PREFIX} build --recipe=zlib --quiet=true --in-container=true`,
  ]);
  assert.equal(fetch.calls.length, 0);
});

test("commands: build on a machine host starts the machine first", async (t) => {
  const { deps, runner, context } = setup(t, () => ({}), "darwin");
  addRecipe(context.recipesDir, "zlib");

  await runBuild(deps, { recipe: "zlib", quiet: false, inContainer: false });

  assert.deepEqual(runner.lines(), [
    "podman machine inspect hearth-default-machine",
    "podman machine start hearth-default-machine",
    "podman system connection default hearth-default-machine",
    "podman container exists hearth-default",
    `${REENTRY_PREFIX} build --recipe=zlib --quiet=false --in-container=true`,
  ]);
});

test("commands: other build commands re-enter under their own name", async (t) => {
  const { deps, runner, context } = setup(t);
  addRecipe(context.recipesDir, "zlib");

  await runRebuild(deps, { recipe: "zlib", quiet: false, inContainer: false });
  await runPackage(deps, { recipe: "zlib", quiet: false, inContainer: false });
  await runBuildAll(deps, { quiet: true, inContainer: false });

  assert.deepEqual(
    runner.lines().filter((line) => line.startsWith("podman exec")),
    [
      `${REENTRY_PREFIX} rebuild --recipe=zlib --quiet=false --in-container=true`,
      `${REENTRY_PREFIX} package --recipe=zlib --quiet=false --in-container=true`,
      `${REENTRY_PREFIX} build-all --quiet=true --in-container=true`,
    ],
  );
});

test("commands: re-entry carries cache, recipes and debug settings", async (t) => {
  const { deps, runner, context } = setup(t, () => ({}), "linux", {
    HEARTH_CACHE_DIR: "var/cache",
    HEARTH_RECIPES_DIR: "pkgs",
    HEARTH_DEBUG: "exec,fetch",
  });
  addRecipe(context.recipesDir, "zlib");

  await runBuild(deps, { recipe: "zlib", quiet: false, inContainer: false });

  assert.deepEqual(runner.calls[1]?.args, [
    "exec",
    "-e",
    "HEARTH_CACHE_DIR=/hearth/var/cache",
    "-e",
    "HEARTH_DEBUG=fetch,exec",
    "-e",
    "HEARTH_RECIPES_DIR=/hearth/pkgs",
    "hearth-default",
    "/bin/sh",
    "-c",
    "cd /hearth && npx --no-install hearth build --recipe=zlib --quiet=false --in-container=true",
  ]);
});

test("commands: a cache outside the workspace cannot be shared with the container", async (t) => {
  const outside = tempDir(t);
  const { deps, runner, context } = setup(t, () => ({}), "linux", { HEARTH_CACHE_DIR: outside });
  addRecipe(context.recipesDir, "zlib");

  await assert.rejects(
    runBuild(deps, { recipe: "zlib", quiet: false, inContainer: false }),
    (err: unknown) =>
      err instanceof ConfigurationError &&
      err.message ===
        `Cache directory ${outside} is outside the workspace ${context.workspace} and is not visible inside the container`,
  );
  assert.deepEqual(runner.calls, []);
});

test("commands: an unknown recipe fails before touching the container", async (t) => {
  const { deps, runner } = setup(t);
  fs.mkdirSync(deps.context.recipesDir, { recursive: true });

  await assert.rejects(
    runBuild(deps, { recipe: "nope", quiet: false, inContainer: false }),
    (err: unknown) => err instanceof ConfigurationError && err.message === "No such recipe: nope",
  );
  assert.deepEqual(runner.calls, []);
});

test("commands: build inside the container runs the pipeline", async (t) => {
  const { deps, runner, context, cache, fetch } = setup(t);
  addRecipe(context.recipesDir, "zlib");

  await runBuild(deps, { recipe: "zlib", quiet: false, inContainer: true });

  assert.equal(fetch.calls.length, 1);
  assert.deepEqual(runner.lines(), ["/bin/sh -c make"]);
  assert.equal(cache.isBuilt("zlib"), true);
  assert.equal(cache.statusOf("zlib"), "packaged");
  assert.equal(
    fs.existsSync(path.join(cache.buildDir("zlib"), "configure")),
    true,
  );
});

test("commands: a built recipe has no work to do", async (t) => {
  const { deps, runner, context, reporter } = setup(t);
  addRecipe(context.recipesDir, "zlib");
  await runBuild(deps, { recipe: "zlib", quiet: false, inContainer: true });
  runner.calls.length = 0;
  reporter.events.length = 0;

  await runBuild(deps, { recipe: "zlib", quiet: false, inContainer: false });

  assert.deepEqual(runner.calls, []);
  assert.deepEqual(reporter.events, ["info:No work to do"]);
});

test("commands: status lists every recipe with its stage", async (t) => {
  const { deps, context, reporter } = setup(t);
  addRecipe(context.recipesDir, "a");
  addRecipe(context.recipesDir, "zlib");
  await runBuild(deps, { recipe: "zlib", quiet: false, inContainer: true });
  reporter.events.length = 0;

  assert.deepEqual(runStatus(deps), [
    { id: "a", stage: "not-fetched" },
    { id: "zlib", stage: "packaged" },
  ]);
  assert.deepEqual(reporter.events, ["info:a     not-fetched", "info:zlib  packaged"]);
});

test("commands: status with no recipes", (t) => {
  const { deps, context, reporter } = setup(t);
  fs.mkdirSync(context.recipesDir);

  assert.deepEqual(runStatus(deps), []);
  assert.deepEqual(reporter.events, [`info:No recipes in ${context.recipesDir}`]);
});

test("commands: make-patch then save-patch through the dispatcher", async (t) => {
  const { deps, context, workspace, questions } = setup(t);
  addRecipe(context.recipesDir, "zlib");
  await runBuild(deps, { recipe: "zlib", quiet: false, inContainer: true });

  await runCommand(deps, { name: "make-patch", recipe: "zlib" });
  const workdir = path.join(workspace, "zlib-workdir");
  fs.writeFileSync(path.join(workdir, "configure"), "#!/bin/sh\nexit 0\n");
  await runCommand(deps, { name: "save-patch", recipe: "zlib" });

  assert.deepEqual(questions, ["Remove workdir directory?"]);
  assert.equal(fs.existsSync(workdir), false);
  assert.equal(
    fs.readFileSync(path.join(workspace, "zlib.patch"), "utf8"),
    [
      "diff --git a/configure b/configure",
      "--- a/configure",
      "+++ b/configure",
      "@@ -1 +1,2 @@",
      " #!/bin/sh",
      "+exit 0",
      "",
    ].join("\n"),
  );
});
