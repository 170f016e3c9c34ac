#!/usr/bin/env node
import { runOutputOnError } from "./output-on-error.js";

async function main() {
  const [command, ...args] = process.argv.slice(2);
  if (!command) {
    console.error("usage: output-on-error <command> [args...]");
    process.exitCode = 2;
    return;
  }
  process.exitCode = await runOutputOnError(command, args);
}

main().catch((err) => {
  console.error("[fatal]", err);
  process.exit(1);
});
