/**
 * Directory scan: splits the files of a directory into parsed candidates and skipped names.
 */

import { join } from "node:path";
import { DirectoryUnreadableError } from "./errors.js";
import type { ParseError, ParsedFile } from "./filename.js";
import { parseFile } from "./filename.js";
import type { FileSystem } from "./fs.js";
import { nodeFileSystem } from "./fs.js";

export interface SkippedFile {
  readonly filename: string;
  readonly error: ParseError;
}

export interface ScanResult {
  readonly files: ParsedFile[];
  readonly skipped: SkippedFile[];
}

export function scanDirectory(directory: string, fs: FileSystem = nodeFileSystem): ScanResult {
  let names: string[];
  try {
    names = fs.listFiles(directory);
  } catch (err: unknown) {
    throw new DirectoryUnreadableError(directory, err);
  }

  const files: ParsedFile[] = [];
  const skipped: SkippedFile[] = [];
  for (const name of [...names].sort()) {
    const result = parseFile(join(directory, name));
    if (result.ok) {
      files.push(result.file);
    } else {
      skipped.push({ filename: name, error: result.error });
    }
  }
  return { files, skipped };
}
