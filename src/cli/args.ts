import { parseArgs } from "node:util";
import type { AppConfig } from "../core/config.js";
import type { RenameOptions } from "../core/rename.js";

export const USAGE = `Usage: date-renamer [directory] [options]

Rename files to YYYYMMDD_<name> using the date found in each filename.
Dash/underscore dates ending in a 4-digit year are read day first:
12-03-2024 is 12 March 2024.

Options:
  -r, --recursive        process subdirectories
  -n, --dry-run          show what would be renamed, rename nothing
  -b, --backup           copy each file to <directory>/.backup first
      --backup-dir <dir> backup location (implies --backup)
  -t, --with-time        keep the time of YYYYMMDD_HHMMSS names
      --pivot <yy>       two-digit years below this are 20yy (default 80)
      --audit-log <file> append one JSON line per rename
  -h, --help             show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type CliArgs = {
  help: boolean;
  directory: string;
  options: RenameOptions;
};

type CliDefaults = Pick<AppConfig, "pivotYear" | "backupDir" | "auditLog">;

function parsePivot(raw: string) {
  const n = Number(raw);
  if (!/^\d+$/.test(raw) || n > 100) {
    throw new UsageError(`--pivot must be an integer from 0 to 100, got "${raw}"`);
  }
  return n;
}

function parse(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        recursive: { type: "boolean", short: "r" },
        "dry-run": { type: "boolean", short: "n" },
        backup: { type: "boolean", short: "b" },
        "backup-dir": { type: "string" },
        "with-time": { type: "boolean", short: "t" },
        pivot: { type: "string" },
        "audit-log": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[], defaults: CliDefaults): CliArgs {
  const { values, positionals } = parse(argv);
  if (positionals.length > 1) {
    throw new UsageError(`Expected one directory, got ${positionals.length}`);
  }

  let backup: boolean | string = false;
  if (values["backup-dir"]) backup = values["backup-dir"];
  else if (values.backup) backup = defaults.backupDir ?? true;

  return {
    help: values.help ?? false,
    directory: positionals[0] ?? ".",
    options: {
      recursive: values.recursive ?? false,
      dryRun: values["dry-run"] ?? false,
      backup,
      includeTime: values["with-time"] ?? false,
      pivotYear:
        values.pivot !== undefined ? parsePivot(values.pivot) : defaults.pivotYear,
      auditLog: values["audit-log"] ?? defaults.auditLog,
    },
  };
}
