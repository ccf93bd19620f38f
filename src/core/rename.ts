import fs from "node:fs/promises";
import path from "node:path";
import { composeName, extractDate, type ExtractOptions } from "./extract.js";
import { makeUniqueName, splitExtension } from "./utils.js";

export type Logger = Pick<Console, "log" | "error">;

export const DEFAULT_BACKUP_DIRNAME = ".backup";

export type RenameAction = {
  source: string;
  target: string;
  relativeSource: string;
  relativeTarget: string;
  canonicalDate: string;
};

export type SkipReason = "no-date" | "already-normalized";

export type SkipRecord = {
  file: string;
  reason: SkipReason;
};

export type RenameFailure = {
  file: string;
  target: string;
  message: string;
  code: string | null;
};

export type RenamePlan = {
  directory: string;
  actions: RenameAction[];
  skipped: SkipRecord[];
};

export type RenameSummary = {
  directory: string;
  dryRun: boolean;
  renamed: Array<{ source: string; target: string }>;
  skipped: SkipRecord[];
  errors: RenameFailure[];
  backupDir: string | null;
  backedUp: number;
};

export type PlanOptions = ExtractOptions & {
  recursive?: boolean;
  /** Absolute directories never descended into. */
  exclude?: string[];
};

export type ApplyOptions = {
  /** true for `<directory>/.backup`, a path for a custom location. */
  backup?: boolean | string;
  auditLog?: string;
  logger?: Logger;
};

export type RenameOptions = PlanOptions &
  ApplyOptions & {
    dryRun?: boolean;
  };

export class InvalidTargetDirectoryError extends Error {
  constructor(
    readonly directory: string,
    reason: string,
  ) {
    super(`${directory} ${reason}`);
    this.name = "InvalidTargetDirectoryError";
  }
}

function errorCode(err: unknown): string | null {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : null;
  }
  return null;
}

function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

async function exists(p: string) {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function assertDirectory(directory: string) {
  const stat = await fs.stat(directory).catch((err: unknown) => {
    if (errorCode(err) === "ENOENT") {
      throw new InvalidTargetDirectoryError(directory, "does not exist");
    }
    throw err;
  });
  if (!stat.isDirectory()) {
    throw new InvalidTargetDirectoryError(directory, "is not a directory");
  }
}

export function resolveBackupDir(
  directory: string,
  backup: boolean | string | undefined,
) {
  if (!backup) return null;
  if (typeof backup === "string") return path.resolve(backup);
  return path.join(directory, DEFAULT_BACKUP_DIRNAME);
}

export async function listFiles(
  directory: string,
  options: { recursive?: boolean; exclude?: string[] } = {},
): Promise<string[]> {
  const exclude = new Set((options.exclude ?? []).map((p) => path.resolve(p)));
  const files: string[] = [];

  async function walk(dir: string) {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isFile()) {
        files.push(full);
      } else if (
        options.recursive &&
        entry.isDirectory() &&
        !exclude.has(full)
      ) {
        await walk(full);
      }
    }
  }

  await walk(path.resolve(directory));
  return files.sort((a, b) => a.localeCompare(b));
}

export async function planRenames(
  directory: string,
  options: PlanOptions = {},
): Promise<RenamePlan> {
  const root = path.resolve(directory);
  await assertDirectory(root);

  const files = await listFiles(root, {
    recursive: options.recursive,
    exclude: [path.join(root, DEFAULT_BACKUP_DIRNAME), ...(options.exclude ?? [])],
  });
  const actions: RenameAction[] = [];
  const skipped: SkipRecord[] = [];

  // Names already present or already claimed, per directory.
  const taken = new Map<string, Set<string>>();
  async function takenIn(dir: string) {
    let names = taken.get(dir);
    if (!names) {
      names = new Set(await fs.readdir(dir));
      taken.set(dir, names);
    }
    return names;
  }

  for (const source of files) {
    const dir = path.dirname(source);
    const name = path.basename(source);
    const relativeSource = path.relative(root, source);

    const result = extractDate(name, options);
    if (!result) {
      skipped.push({ file: relativeSource, reason: "no-date" });
      continue;
    }

    const desired = composeName(result);
    if (desired === name) {
      skipped.push({ file: relativeSource, reason: "already-normalized" });
      continue;
    }

    const names = await takenIn(dir);
    const targetName = makeUniqueName(desired, (n) => names.has(n));
    names.add(targetName);

    const target = path.join(dir, targetName);
    actions.push({
      source,
      target,
      relativeSource,
      relativeTarget: path.relative(root, target),
      canonicalDate: result.canonicalDate,
    });
  }

  return { directory: root, actions, skipped };
}

async function backupFile(source: string, backupDir: string) {
  await fs.mkdir(backupDir, { recursive: true });
  const names = new Set(await fs.readdir(backupDir));
  const name = makeUniqueName(path.basename(source), (n) => names.has(n));
  const copy = path.join(backupDir, name);
  const stat = await fs.stat(source);
  await fs.copyFile(source, copy);
  await fs.utimes(copy, stat.atime, stat.mtime);
}

async function freeTarget(target: string) {
  const dir = path.dirname(target);
  const { stem, ext } = splitExtension(path.basename(target));
  let targetPath = target;
  let counter = 2;
  while (await exists(targetPath)) {
    targetPath = path.join(dir, `${stem} (${counter})${ext}`);
    counter++;
  }
  return targetPath;
}

export async function applyPlan(
  plan: RenamePlan,
  options: ApplyOptions = {},
): Promise<RenameSummary> {
  const logger = options.logger ?? console;
  const backupDir = resolveBackupDir(plan.directory, options.backup);

  const summary: RenameSummary = {
    directory: plan.directory,
    dryRun: false,
    renamed: [],
    skipped: [...plan.skipped],
    errors: [],
    backupDir,
    backedUp: 0,
  };

  if (options.auditLog) {
    await fs.mkdir(path.dirname(options.auditLog), { recursive: true });
  }

  for (const action of plan.actions) {
    let targetPath = action.target;
    try {
      if (backupDir) {
        await backupFile(action.source, backupDir);
        summary.backedUp++;
      }

      targetPath = await freeTarget(action.target);
      await fs.rename(action.source, targetPath);

      const relativeTarget = path.relative(plan.directory, targetPath);
      summary.renamed.push({ source: action.relativeSource, target: relativeTarget });
      logger.log(`  Renamed: ${action.relativeSource} → ${relativeTarget}`);

      if (options.auditLog) {
        await fs.appendFile(
          options.auditLog,
          JSON.stringify({
            ts: new Date().toISOString(),
            source: action.source,
            target: targetPath,
            date: action.canonicalDate,
          }) + "\n",
        );
      }
    } catch (err) {
      logger.error(`  Failed: ${action.relativeSource}`, err);
      summary.errors.push({
        file: action.relativeSource,
        target: path.relative(plan.directory, targetPath),
        message: errorMessage(err),
        code: errorCode(err),
      });
    }
  }

  return summary;
}

export async function renameDirectory(
  directory: string,
  options: RenameOptions = {},
): Promise<RenameSummary> {
  const logger = options.logger ?? console;
  const root = path.resolve(directory);
  const backupDir = resolveBackupDir(root, options.backup);

  logger.log(`Processing directory: ${root}`);
  const plan = await planRenames(root, {
    ...options,
    exclude: [...(options.exclude ?? []), ...(backupDir ? [backupDir] : [])],
  });

  if (options.dryRun) {
    return {
      directory: plan.directory,
      dryRun: true,
      renamed: plan.actions.map((a) => ({
        source: a.relativeSource,
        target: a.relativeTarget,
      })),
      skipped: plan.skipped,
      errors: [],
      backupDir: null,
      backedUp: 0,
    };
  }

  return applyPlan(plan, { ...options, logger });
}
