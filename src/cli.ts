#!/usr/bin/env node
/**
 * padnum – zero-pads the "(n)" number group of a file series so alphabetical order matches numeric order.
 * Supports --help, --version, --dry-run, --verbose, and script mode (--dir, --yes).
 */

import { runInteractive } from "./commands/interactive.js";
import { runScriptMode } from "./commands/script.js";
import { parseArgs, printHelp, printVersion } from "./flags.js";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }
  if (args.version) {
    printVersion();
    process.exit(0);
  }

  if (args.dir !== undefined) {
    runScriptMode(args);
    return;
  }

  await runInteractive(args.dryRun, args.verbose);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
