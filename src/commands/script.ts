/**
 * Script mode: non-interactive run via --dir.
 */

import type { ParsedArgs } from "../flags.js";
import { SeriesRenamer } from "../renamer.js";
import {
  checkDir,
  checkNothingToDo,
  errorMessage,
  formatPreview,
  formatSkipped,
  formatSummary,
  formatUnchanged,
  PREVIEW_MAX_LINES,
} from "./common.js";

function fail(err: unknown): never {
  console.error("Error:", errorMessage(err));
  process.exit(1);
}

export function runScriptMode(args: ParsedArgs): void {
  const { dir, dryRun, yes, verbose } = args;
  if (dir === undefined) {
    fail("Script mode requires --dir.");
  }
  const dirError = checkDir(dir);
  if (dirError !== undefined) {
    fail(dirError);
  }

  let renamer: SeriesRenamer;
  try {
    renamer = SeriesRenamer.open(dir);
  } catch (err: unknown) {
    fail(err);
  }

  if (verbose && renamer.skipped.length > 0) {
    console.error(`Skipped ${renamer.skipped.length} file(s):\n${formatSkipped(renamer.skipped)}`);
  }

  let nothingToDo: string | undefined;
  try {
    nothingToDo = checkNothingToDo(renamer);
  } catch (err: unknown) {
    fail(err);
  }
  if (nothingToDo !== undefined) {
    console.log(nothingToDo);
    process.exit(0);
  }

  const renames = renamer.filesToRename();
  const total = renamer.plan.entries.length;

  console.log(formatPreview(renames, PREVIEW_MAX_LINES));
  const unchanged = renamer.filesWithoutRename();
  if (verbose && unchanged.length > 0) {
    console.log(`Already padded:\n${formatUnchanged(unchanged)}`);
  }

  if (dryRun) {
    process.exit(0);
  }
  if (!yes) {
    console.error("Use --yes to apply renames in script mode.");
    process.exit(1);
  }
  try {
    renamer.renameAll();
    console.log(formatSummary(renames.length, total));
  } catch (err: unknown) {
    fail(err);
  }
}
