/**
 * Rename plan: the padded name for every numbered file of one directory.
 */

import type { ParsedFile } from "./filename.js";
import { filenamePrefix, filenameSuffix } from "./filename.js";
import { digitCount, padNumber } from "./padding.js";

export interface RenamePlanEntry {
  readonly file: ParsedFile;
  /** Undefined when the file already carries the right padding. */
  readonly newFilename: string | undefined;
}

export type PendingRename = RenamePlanEntry & { readonly newFilename: string };

export interface RenamePlan {
  /** Sorted by number value. */
  readonly entries: readonly RenamePlanEntry[];
  /** Digit count of the largest number value; every entry is padded to it. */
  readonly maxDigitWidth: number;
}

export function needsRename(entry: RenamePlanEntry): entry is PendingRename {
  return entry.newFilename !== undefined;
}

export function compareEntries(a: RenamePlanEntry, b: RenamePlanEntry): number {
  const byValue = a.file.numberValue - b.file.numberValue;
  if (byValue !== 0) return byValue;
  const x = a.file.originalFilename;
  const y = b.file.originalFilename;
  return x < y ? -1 : x > y ? 1 : 0;
}

export function buildRenamePlan(files: readonly ParsedFile[]): RenamePlan {
  if (files.length === 0) {
    return { entries: [], maxDigitWidth: 0 };
  }

  const max = files.reduce((acc, f) => Math.max(acc, f.numberValue), 0);
  const maxDigitWidth = digitCount(max);

  const entries = files.map((file): RenamePlanEntry => {
    const newFilename =
      filenamePrefix(file) + padNumber(file.numberValue, maxDigitWidth) + filenameSuffix(file);
    return {
      file,
      newFilename: newFilename === file.originalFilename ? undefined : newFilename,
    };
  });
  entries.sort(compareEntries);

  return { entries, maxDigitWidth };
}

export function pendingRenames(plan: RenamePlan): PendingRename[] {
  return plan.entries.filter(needsRename);
}

export function unchangedEntries(plan: RenamePlan): RenamePlanEntry[] {
  return plan.entries.filter((e) => !needsRename(e));
}
