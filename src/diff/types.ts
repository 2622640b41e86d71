export type FileStatus = "added" | "deleted" | "modified" | "renamed" | "binary";

export interface Hunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
}

export interface FileDiff {
  oldPath: string;
  newPath: string;
  status: FileStatus;
  hunks: readonly Hunk[];
  /** Text changes exist but the source gave no patch for them (GitHub omits very large ones) */
  patchOmitted?: boolean;
}

export type DiffParseErrorKind = "malformed-file-header" | "malformed-hunk-header";

export interface DiffParseError {
  kind: DiffParseErrorKind;
  /** 1-based line in the raw diff text where the problem was detected */
  lineNumber: number;
  /** Best-known path of the file being parsed, if any */
  path?: string;
  message: string;
}

export interface DiffSet {
  files: readonly FileDiff[];
  errors: readonly DiffParseError[];
}

/** Inclusive [start, end] range of NEW-file line numbers */
export type LineRange = readonly [start: number, end: number];

/** Addressable NEW-file lines contributed by a hunk, or null for a pure deletion */
export function newLineRange(hunk: Hunk): LineRange | null {
  if (hunk.newCount <= 0) return null;
  return [hunk.newStart, hunk.newStart + hunk.newCount - 1];
}
