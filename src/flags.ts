/**
 * CLI flag parsing and usage/version output.
 */

import { parse } from "@bomb.sh/args";

export const VERSION = "0.1.0";

export interface ParsedArgs {
  help: boolean;
  version: boolean;
  dryRun: boolean;
  dir: string | undefined;
  yes: boolean;
  verbose: boolean;
}

const ARGS_CONFIG = {
  boolean: ["help", "version", "dry-run", "yes", "verbose"] as const,
  string: ["dir"] as const,
  alias: { h: "help", v: "version", y: "yes" } as const,
};

export function parseArgs(argv: string[]): ParsedArgs {
  const raw = parse(argv, ARGS_CONFIG);
  return {
    help: Boolean(raw.help),
    version: Boolean(raw.version),
    dryRun: Boolean(raw["dry-run"]),
    dir: raw.dir,
    yes: Boolean(raw.yes),
    verbose: Boolean(raw.verbose),
  };
}

export function printHelp(): void {
  const usage = `padnum – zero-pad numbered file series like "paris (1).jpg" … "paris (734).jpg"

Usage:
  padnum                 Interactive mode (prompts for folder, shows preview, asks to confirm)
  padnum --help          Show this help
  padnum --version       Show version
  padnum --dry-run       Interactive mode, show preview only (no rename)
  padnum --dir <path> [options]   Script mode

Script mode options:
  --dir <path>           Directory with the numbered files
  --yes, -y              Apply renames without confirmation
  --dry-run              Show preview only, do not rename
  --verbose              Also list skipped files and files that are already padded

Examples:
  padnum
  padnum --dir ./photos --dry-run
  padnum --dir ./photos --yes`;
  console.log(usage);
}

export function printVersion(): void {
  console.log(VERSION);
}
