#!/usr/bin/env node
import { formatCliError, parseCommand, usage } from "../src/cli";
import { createDefaultDeps, runCommand } from "../src/commands";
import { DEFAULT_CONFIG, resolveContext } from "../src/config";

// the runtime binary, once the context is known
let runtime = DEFAULT_CONFIG.runtime;

async function main() {
  const command = parseCommand(process.argv.slice(2));

  if (command.name === "help") {
    process.stdout.write(usage(command.topic));
    return;
  }

  const context = resolveContext({
    overrides: command.name === "init" && command.image ? { image: command.image } : {},
  });
  runtime = context.runtime;
  await runCommand(createDefaultDeps(context), command);
}

main().catch((err) => {
  process.stderr.write(formatCliError(err, runtime));
  process.exit(1);
});
