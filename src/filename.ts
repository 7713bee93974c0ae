/**
 * Filename parsing: finds the single "(123)" number group in a filename.
 */

import { basename } from "node:path";

/** One or more ASCII digits in literal parentheses. */
const NUMBER_GROUP_PATTERN = /\(([0-9]+)\)/g;

export interface ParsedFile {
  readonly path: string;
  /** Last component of `path`, e.g. "paris (12).jpg" */
  readonly originalFilename: string;
  /** Half-open range of the digits inside the parentheses. */
  readonly numberGroupSpan: readonly [start: number, end: number];
  readonly numberValue: number;
}

export type ParseError =
  | { readonly kind: "NoNumberGroup"; readonly filename: string }
  | { readonly kind: "MultipleNumberGroups"; readonly filename: string }
  | { readonly kind: "InvalidNumber"; readonly filename: string; readonly text: string };

export type ParseResult =
  | { readonly ok: true; readonly file: ParsedFile }
  | { readonly ok: false; readonly error: ParseError };

export function parseFile(path: string): ParseResult {
  const filename = basename(path);
  const matches = [...filename.matchAll(NUMBER_GROUP_PATTERN)];

  if (matches.length === 0) {
    return { ok: false, error: { kind: "NoNumberGroup", filename } };
  }
  if (matches.length > 1) {
    return { ok: false, error: { kind: "MultipleNumberGroups", filename } };
  }

  const [match] = matches;
  const digits = match[1];
  // the group is unique, so its first occurrence is the match; +1 skips "("
  const start = filename.indexOf(match[0]) + 1;
  const end = start + digits.length;

  const numberValue = Number(digits);
  if (!Number.isSafeInteger(numberValue)) {
    return { ok: false, error: { kind: "InvalidNumber", filename, text: digits } };
  }

  return {
    ok: true,
    file: Object.freeze({
      path,
      originalFilename: filename,
      numberGroupSpan: [start, end] as const,
      numberValue,
    }),
  };
}

/** Everything before the digits, including "(". */
export function filenamePrefix(file: ParsedFile): string {
  return file.originalFilename.slice(0, file.numberGroupSpan[0]);
}

/** Everything after the digits, including ")". */
export function filenameSuffix(file: ParsedFile): string {
  return file.originalFilename.slice(file.numberGroupSpan[1]);
}

export function describeParseError(error: ParseError): string {
  switch (error.kind) {
    case "NoNumberGroup":
      return "no number group like (123) in the name";
    case "MultipleNumberGroups":
      return "more than one number group in the name";
    case "InvalidNumber":
      return `number "${error.text}" is too large`;
  }
}
