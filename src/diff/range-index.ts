import { ContractViolationError, describeValue, isArray } from "../errors.js";
import { newLineRange, type DiffSet, type FileStatus, type LineRange } from "./types.js";

export interface IndexedFile {
  path: string;
  status: FileStatus;
  /** Sorted, non-overlapping, non-adjacent inclusive ranges of commentable NEW lines */
  ranges: readonly LineRange[];
  /** Pre-rename path when the file was renamed */
  previousPath?: string;
  /** The file changed but no patch was available to index */
  patchOmitted?: boolean;
}

/**
 * Addressable NEW-file lines per path for one diff. Built once per diff
 * and shared read-only across validations.
 */
export interface RangeIndex {
  readonly files: ReadonlyMap<string, IndexedFile>;
  /** oldPath → newPath for files whose path changed */
  readonly renames: ReadonlyMap<string, string>;
}

export function buildRangeIndex(diffSet: DiffSet): RangeIndex {
  if (typeof diffSet !== "object" || diffSet === null || !isArray(diffSet.files)) {
    throw new ContractViolationError(`buildRangeIndex expects a DiffSet, received ${describeValue(diffSet)}`);
  }

  const files = new Map<string, IndexedFile>();
  const renames = new Map<string, string>();

  for (const file of diffSet.files) {
    let ranges: LineRange[] = [];

    switch (file.status) {
      case "deleted":
      case "binary":
        break;
      case "added": {
        const total = file.hunks.reduce((sum, hunk) => sum + hunk.newCount, 0);
        if (total > 0) ranges = [[1, total]];
        break;
      }
      case "modified":
      case "renamed":
        for (const hunk of file.hunks) {
          const range = newLineRange(hunk);
          if (range) ranges.push(range);
        }
        ranges = mergeRanges(ranges);
        break;
    }

    const entry: IndexedFile = {
      path: file.newPath,
      status: file.status,
      ranges: Object.freeze(ranges.map((range) => Object.freeze(range))),
    };
    if (file.patchOmitted) entry.patchOmitted = true;
    if (file.oldPath !== file.newPath) {
      entry.previousPath = file.oldPath;
      renames.set(file.oldPath, file.newPath);
    }
    files.set(file.newPath, Object.freeze(entry));
  }

  return Object.freeze({ files, renames });
}

/** Sorts ranges and merges any that overlap or touch */
export function mergeRanges(ranges: readonly LineRange[]): LineRange[] {
  const sorted = [...ranges].sort((a, b) => a[0] - b[0] || a[1] - b[1]);
  const merged: [number, number][] = [];

  for (const [start, end] of sorted) {
    const last = merged[merged.length - 1];
    if (last && start <= last[1] + 1) {
      last[1] = Math.max(last[1], end);
    } else {
      merged.push([start, end]);
    }
  }
  return merged;
}

/** Binary search for the range containing `line` */
export function findRange(ranges: readonly LineRange[], line: number): LineRange | undefined {
  let low = 0;
  let high = ranges.length - 1;
  while (low <= high) {
    const mid = (low + high) >>> 1;
    const [start, end] = ranges[mid];
    if (line < start) {
      high = mid - 1;
    } else if (line > end) {
      low = mid + 1;
    } else {
      return ranges[mid];
    }
  }
  return undefined;
}

/** Renders ranges as `10-15, 51-62`; single-line ranges render as `7` */
export function formatRanges(ranges: readonly LineRange[], max = Infinity): string {
  if (ranges.length === 0) return "none";
  const shown = ranges.slice(0, max).map(([start, end]) => (start === end ? `${start}` : `${start}-${end}`));
  const hidden = ranges.length - shown.length;
  return hidden > 0 ? `${shown.join(", ")}, +${hidden} more` : shown.join(", ");
}
