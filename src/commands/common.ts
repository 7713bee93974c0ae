/**
 * Shared utilities for script and interactive commands.
 */

import { existsSync, statSync } from "node:fs";
import { describeParseError } from "../filename.js";
import type { PendingRename, RenamePlanEntry } from "../plan.js";
import type { SeriesRenamer } from "../renamer.js";
import type { SkippedFile } from "../scan.js";

export const PREVIEW_MAX_LINES = 20;

export function formatPreview(renames: readonly PendingRename[], maxLines: number): string {
  const lines = renames
    .slice(0, maxLines)
    .map((r) => `${r.file.originalFilename} → ${r.newFilename}`);
  if (renames.length > maxLines) {
    lines.push(`… and ${renames.length - maxLines} more`);
  }
  return lines.join("\n");
}

export function formatSkipped(skipped: readonly SkippedFile[]): string {
  return skipped.map((s) => `${s.filename}: ${describeParseError(s.error)}`).join("\n");
}

export function formatUnchanged(entries: readonly RenamePlanEntry[]): string {
  return entries.map((e) => e.file.originalFilename).join("\n");
}

export function formatSummary(renamed: number, total: number): string {
  return `Renamed ${renamed} of ${total} numbered file(s); ${total - renamed} already had the right padding.`;
}

/** Message for an empty rename set: no numbered files at all, or all already padded. */
export function nothingToDoMessage(total: number): string {
  return total === 0
    ? "No numbered files like \"name (1).ext\" in that folder."
    : `All ${total} numbered file(s) already have the right padding.`;
}

/**
 * Validates the plan, then returns the "nothing to do" message, or undefined when there are
 * files to rename. Throws when the files do not form one series.
 */
export function checkNothingToDo(renamer: SeriesRenamer): string | undefined {
  renamer.checkCanRenameAll();
  if (renamer.filesToRename().length > 0) return undefined;
  return nothingToDoMessage(renamer.plan.entries.length);
}

/** Returns an error message, or undefined if `dir` is an existing directory. */
export function checkDir(dir: string): string | undefined {
  if (!existsSync(dir)) return `Directory does not exist: ${dir}`;
  if (!statSync(dir).isDirectory()) return `Not a directory: ${dir}`;
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
