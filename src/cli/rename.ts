#!/usr/bin/env node
import { runRename } from "./run.js";

async function main() {
  process.exitCode = await runRename(process.argv.slice(2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
