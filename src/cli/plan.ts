#!/usr/bin/env node
import { runPlan } from "./run.js";

async function main() {
  process.exitCode = await runPlan(process.argv.slice(2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
