/**
 * Interactive mode: prompts for a folder, then preview and confirm.
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import { VERSION } from "../flags.js";
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

function exitIfCancel(value: unknown): asserts value is string | boolean {
  if (p.isCancel(value)) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
}

export async function runInteractive(dryRun: boolean, verbose: boolean): Promise<void> {
  p.intro(pc.bold(pc.magenta(`padnum - zero-pad numbered file series - v${VERSION}`)));

  const dirResult = await p.text({
    message: "Folder with the numbered files",
    initialValue: process.cwd(),
    validate: (value) => (value ? checkDir(value) : "Please enter a folder."),
  });
  exitIfCancel(dirResult);
  if (typeof dirResult !== "string") {
    p.cancel("Cancelled.");
    process.exit(0);
  }
  const dir = dirResult;

  let renamer: SeriesRenamer;
  try {
    renamer = SeriesRenamer.open(dir);
  } catch (err: unknown) {
    p.log.error(errorMessage(err));
    process.exit(1);
  }

  if (renamer.skipped.length > 0) {
    if (verbose) {
      p.note(formatSkipped(renamer.skipped), "Skipped");
    } else {
      p.log.info(`Skipping ${renamer.skipped.length} file(s) without exactly one number group.`);
    }
  }

  let nothingToDo: string | undefined;
  try {
    nothingToDo = checkNothingToDo(renamer);
  } catch (err: unknown) {
    p.log.error(errorMessage(err));
    process.exit(1);
  }
  if (nothingToDo !== undefined) {
    p.outro(pc.yellow(`${nothingToDo} Exiting.`));
    process.exit(0);
  }

  const renames = renamer.filesToRename();
  const total = renamer.plan.entries.length;

  p.note(formatPreview(renames, PREVIEW_MAX_LINES), "Preview");
  const unchanged = renamer.filesWithoutRename();
  if (verbose && unchanged.length > 0) {
    p.note(formatUnchanged(unchanged), "Already padded");
  }

  if (dryRun) {
    p.note("Dry run: no files were renamed.", "Done");
    p.outro(pc.green("Done."));
    process.exit(0);
  }

  const confirmResult = await p.confirm({
    message: `Rename ${renames.length} file(s)?`,
    initialValue: false,
  });
  exitIfCancel(confirmResult);
  if (!confirmResult) {
    p.cancel("Rename cancelled.");
    process.exit(0);
  }

  const s = p.spinner();
  s.start("Renaming…");
  try {
    renamer.renameAll();
    s.stop("Done.");
  } catch (err: unknown) {
    s.stop("Failed.");
    p.log.error(errorMessage(err));
    process.exit(1);
  }

  p.note(formatSummary(renames.length, total), "Done");
  p.outro(pc.green("Done."));
}
