/**
 * Renamer for one directory: scan and plan once, then inspect, check and apply.
 * Performs no interactive I/O; callers render the plan and decide whether to apply it.
 */

import { executeRenamePlan } from "./execute.js";
import type { FileSystem } from "./fs.js";
import { nodeFileSystem } from "./fs.js";
import type { PendingRename, RenamePlan, RenamePlanEntry } from "./plan.js";
import { buildRenamePlan, pendingRenames, unchangedEntries } from "./plan.js";
import type { SkippedFile } from "./scan.js";
import { scanDirectory } from "./scan.js";
import { validateRenamePlan } from "./validate.js";

export class SeriesRenamer {
  private constructor(
    readonly directory: string,
    readonly plan: RenamePlan,
    readonly skipped: readonly SkippedFile[],
    private readonly fs: FileSystem,
  ) {}

  /** Throws DirectoryUnreadableError if `directory` cannot be listed. */
  static open(directory: string, fs: FileSystem = nodeFileSystem): SeriesRenamer {
    const { files, skipped } = scanDirectory(directory, fs);
    return new SeriesRenamer(directory, buildRenamePlan(files), skipped, fs);
  }

  filesToRename(): PendingRename[] {
    return pendingRenames(this.plan);
  }

  filesWithoutRename(): RenamePlanEntry[] {
    return unchangedEntries(this.plan);
  }

  checkCanRenameAll(): void {
    validateRenamePlan(this.plan, this.directory, this.fs);
  }

  renameAll(): readonly RenamePlanEntry[] {
    return executeRenamePlan(this.plan, this.directory, this.fs);
  }
}
