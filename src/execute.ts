import { join } from "node:path";
import { RenameFailedError } from "./errors.js";
import type { FileSystem } from "./fs.js";
import { nodeFileSystem } from "./fs.js";
import type { RenamePlan, RenamePlanEntry } from "./plan.js";
import { pendingRenames } from "./plan.js";
import { validateRenamePlan } from "./validate.js";

/**
 * Validate the plan, then rename its pending entries in plan order.
 * Stops at the first failed rename; earlier renames stay applied.
 * Returns every entry of the plan, including the ones that needed no rename.
 */
export function executeRenamePlan(
  plan: RenamePlan,
  directory: string,
  fs: FileSystem = nodeFileSystem,
): readonly RenamePlanEntry[] {
  validateRenamePlan(plan, directory, fs);

  let renamedCount = 0;
  for (const { file, newFilename } of pendingRenames(plan)) {
    const from = join(directory, file.originalFilename);
    const to = join(directory, newFilename);
    try {
      fs.rename(from, to);
    } catch (err: unknown) {
      throw new RenameFailedError(from, to, err, renamedCount);
    }
    renamedCount++;
  }

  return plan.entries;
}
