import type { RenameSummary, SkipReason } from "./rename.js";

const SKIP_REASONS: Record<SkipReason, string> = {
  "no-date": "no valid date found",
  "already-normalized": "already normalized",
};

export function formatSummary(summary: RenameSummary): string[] {
  const lines = ["", "Renaming Summary:", "-".repeat(50)];

  if (summary.backupDir) {
    lines.push("", `Backup location: ${summary.backupDir}`);
    lines.push(`Files backed up: ${summary.backedUp}`);
  }

  if (summary.renamed.length) {
    lines.push("", summary.dryRun ? "Would rename:" : "Renamed files:");
    for (const { source, target } of summary.renamed) {
      lines.push(`  ${source} → ${target}`);
    }
  }

  if (summary.skipped.length) {
    lines.push("", "Skipped files:");
    for (const { file, reason } of summary.skipped) {
      lines.push(`  ${file} (${SKIP_REASONS[reason]})`);
    }
  }

  if (summary.errors.length) {
    lines.push("", "Errors:");
    for (const e of summary.errors) {
      lines.push(`  ${e.file} → ${e.target}: ${e.message}`);
    }
  }

  lines.push(
    "",
    `Total ${summary.dryRun ? "to rename" : "renamed"}: ${summary.renamed.length}`,
    `Total skipped: ${summary.skipped.length}`,
    `Total errors: ${summary.errors.length}`,
  );
  return lines;
}
