/**
 * Plan validation. Runs before the first rename; applied renames are never rolled back.
 */

import { join } from "node:path";
import { AmbiguousPrefixesError, AmbiguousSuffixesError, ConflictingFilesError } from "./errors.js";
import { filenamePrefix, filenameSuffix } from "./filename.js";
import type { FileSystem } from "./fs.js";
import { nodeFileSystem } from "./fs.js";
import type { RenamePlan } from "./plan.js";
import { pendingRenames } from "./plan.js";

function sorted(values: Iterable<string>): string[] {
  return [...values].sort();
}

/**
 * All entries must share one prefix and one suffix. Two suffixes that differ only in case
 * (".jpg" and ".JPG") are accepted.
 */
export function checkPrefixesAndSuffixes(plan: RenamePlan): void {
  const prefixes = new Set<string>();
  const suffixes = new Set<string>();
  for (const { file } of plan.entries) {
    prefixes.add(filenamePrefix(file));
    suffixes.add(filenameSuffix(file));
  }

  if (prefixes.size > 1) {
    throw new AmbiguousPrefixesError(sorted(prefixes));
  }
  if (suffixes.size > 1) {
    const [a, b] = [...suffixes];
    const caseOnly = suffixes.size === 2 && a.toLowerCase() === b.toLowerCase();
    if (!caseOnly) throw new AmbiguousSuffixesError(sorted(suffixes));
  }
}

/** No target may exist already, and no two entries may share a target. */
export function checkDestinations(
  plan: RenamePlan,
  directory: string,
  fs: FileSystem = nodeFileSystem,
): void {
  const claimed = new Set<string>();
  const conflicts = new Set<string>();

  for (const { newFilename } of pendingRenames(plan)) {
    const target = join(directory, newFilename);
    if (claimed.has(newFilename) || fs.exists(target)) {
      conflicts.add(target);
    }
    claimed.add(newFilename);
  }

  if (conflicts.size > 0) {
    throw new ConflictingFilesError(sorted(conflicts));
  }
}

export function validateRenamePlan(
  plan: RenamePlan,
  directory: string,
  fs: FileSystem = nodeFileSystem,
): void {
  checkPrefixesAndSuffixes(plan);
  checkDestinations(plan, directory, fs);
}
