/**
 * Fatal errors. Anything thrown from here aborts the run before (or while) files are renamed.
 */

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function quoteAll(values: readonly string[]): string {
  return values.map((v) => `"${v}"`).join(", ");
}

export class PadnumError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DirectoryUnreadableError extends PadnumError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Cannot read directory "${path}": ${describeCause(cause)}`, { cause });
    this.path = path;
  }
}

export class ConflictingFilesError extends PadnumError {
  readonly paths: readonly string[];

  constructor(paths: readonly string[]) {
    const lines = paths.map((p) => `  ${p}`).join("\n");
    super(
      `Cannot rename: ${paths.length} new file name(s) conflict with existing files or with each other:\n${lines}`,
    );
    this.paths = paths;
  }
}

export class AmbiguousPrefixesError extends PadnumError {
  readonly prefixes: readonly string[];

  constructor(prefixes: readonly string[]) {
    super(`Files in this directory have more than one prefix before the number: ${quoteAll(prefixes)}`);
    this.prefixes = prefixes;
  }
}

export class AmbiguousSuffixesError extends PadnumError {
  readonly suffixes: readonly string[];

  constructor(suffixes: readonly string[]) {
    super(`Files in this directory have more than one suffix after the number: ${quoteAll(suffixes)}`);
    this.suffixes = suffixes;
  }
}

export class RenameFailedError extends PadnumError {
  readonly oldPath: string;
  readonly newPath: string;
  /** Renames that had already been applied when this one failed. */
  readonly renamedCount: number;

  constructor(oldPath: string, newPath: string, cause: unknown, renamedCount: number) {
    super(
      `Failed to rename "${oldPath}" to "${newPath}": ${describeCause(cause)}. ` +
        `${renamedCount} file(s) were already renamed and are not rolled back; the directory may be in an inconsistent state.`,
      { cause },
    );
    this.oldPath = oldPath;
    this.newPath = newPath;
    this.renamedCount = renamedCount;
  }
}
