export type { ParseError, ParseResult, ParsedFile } from "./filename.js";
export { describeParseError, filenamePrefix, filenameSuffix, parseFile } from "./filename.js";
export { digitCount, leadingZeroCount, padNumber } from "./padding.js";
export type { PendingRename, RenamePlan, RenamePlanEntry } from "./plan.js";
export { buildRenamePlan, compareEntries, needsRename, pendingRenames, unchangedEntries } from "./plan.js";
export { checkDestinations, checkPrefixesAndSuffixes, validateRenamePlan } from "./validate.js";
export { executeRenamePlan } from "./execute.js";
export type { ScanResult, SkippedFile } from "./scan.js";
export { scanDirectory } from "./scan.js";
export type { FileSystem } from "./fs.js";
export { nodeFileSystem } from "./fs.js";
export { SeriesRenamer } from "./renamer.js";
export {
  AmbiguousPrefixesError,
  AmbiguousSuffixesError,
  ConflictingFilesError,
  DirectoryUnreadableError,
  PadnumError,
  RenameFailedError,
} from "./errors.js";
