import { ConfigError, loadConfig } from "../core/config.js";
import {
  InvalidTargetDirectoryError,
  renameDirectory,
  type Logger,
  type RenameOptions,
  type RenameSummary,
} from "../core/rename.js";
import { formatSummary } from "../core/summary.js";
import { parseCliArgs, USAGE, UsageError, type CliArgs } from "./args.js";

export type CliIO = {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
};

function readArgs(argv: string[], io: CliIO, logger: Logger): CliArgs | null {
  try {
    return parseCliArgs(argv, loadConfig(io.env ?? process.env));
  } catch (err) {
    if (err instanceof UsageError || err instanceof ConfigError) {
      logger.error(`Error: ${err.message}`);
      logger.error(USAGE);
      return null;
    }
    throw err;
  }
}

async function run(
  argv: string[],
  io: CliIO,
  overrides: Partial<RenameOptions>,
  format: (summary: RenameSummary) => string[],
) {
  const logger = io.logger ?? console;
  const args = readArgs(argv, io, logger);
  if (!args) return 1;
  if (args.help) {
    logger.log(USAGE);
    return 0;
  }

  try {
    const summary = await renameDirectory(args.directory, {
      ...args.options,
      ...overrides,
      logger,
    });
    for (const line of format(summary)) logger.log(line);
    return 0;
  } catch (err) {
    if (err instanceof InvalidTargetDirectoryError) {
      logger.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

/** Renames files (or plans, under --dry-run) and prints the summary. */
export async function runRename(argv: string[], io: CliIO = {}) {
  return run(argv, io, {}, formatSummary);
}

/** Always a dry run; prints one `old => new` line per planned rename. */
export async function runPlan(argv: string[], io: CliIO = {}) {
  return run(argv, io, { dryRun: true, backup: false }, (summary) =>
    summary.renamed.map((r) => `${r.source} => ${r.target}`),
  );
}
