import { ContractViolationError, describeValue } from "../errors.js";
import type { DiffParseError, DiffSet, FileDiff, FileStatus, Hunk } from "./types.js";

type ParserState = "seeking-file-header" | "seeking-hunk-header" | "in-hunk";

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const BINARY_FILES = /^Binary files (.+) and (.+) differ$/;
const DEV_NULL = "/dev/null";

/** Accumulates the header and hunks of one `diff --git` block */
interface FileBlock {
  headerLine: number;
  gitOldPath?: string;
  gitNewPath?: string;
  /** undefined when absent, null when the side is /dev/null */
  minusPath?: string | null;
  plusPath?: string | null;
  expectPlus: boolean;
  renameFrom?: string;
  renameTo?: string;
  copyTo?: string;
  newFileMode: boolean;
  deletedFileMode: boolean;
  modeChange: boolean;
  binary: boolean;
  reader: HunkReader;
  malformed?: DiffParseError;
}

/**
 * Parses `diff --git` style unified diff text into a DiffSet.
 *
 * Malformed hunks and file headers are dropped and recorded in `errors`;
 * the rest of the diff is still parsed. Text without any `diff --git` line
 * yields an empty DiffSet.
 */
export function parseDiff(raw: string): DiffSet {
  if (typeof raw !== "string") {
    throw new ContractViolationError(`parseDiff expects diff text, received ${describeValue(raw)}`);
  }

  const files: FileDiff[] = [];
  const errors: DiffParseError[] = [];
  let state: ParserState = "seeking-file-header";
  let block: FileBlock | null = null;

  const lines = raw.split(/\r?\n/);

  const openBlock = (line: string, lineNumber: number): FileBlock => {
    const [gitOldPath, gitNewPath] = parseGitHeaderPaths(line) ?? [];
    const opened: FileBlock = {
      headerLine: lineNumber,
      gitOldPath,
      gitNewPath,
      expectPlus: false,
      newFileMode: false,
      deletedFileMode: false,
      modeChange: false,
      binary: false,
      reader: createHunkReader((at, message) =>
        errors.push({ kind: "malformed-hunk-header", lineNumber: at, path: blockPath(opened), message })
      ),
    };
    return opened;
  };

  const markMalformed = (current: FileBlock, lineNumber: number, message: string): void => {
    current.malformed ??= {
      kind: "malformed-file-header",
      lineNumber,
      path: blockPath(current),
      message,
    };
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineNumber = i + 1;

    if (state === "in-hunk" && block) {
      const consumed = block.reader.consume(line, lineNumber);
      state = block.reader.open ? "in-hunk" : "seeking-hunk-header";
      if (consumed) continue;
    }

    if (line.startsWith("diff --git ")) {
      if (block) finalizeBlock(block, lineNumber, files, errors);
      block = openBlock(line, lineNumber);
      state = "seeking-hunk-header";
      continue;
    }

    if (state === "seeking-file-header" || !block || block.malformed) continue;

    if (line.startsWith("@@")) {
      if (block.binary) continue;
      if (block.minusPath === undefined || block.plusPath === undefined) {
        markMalformed(block, lineNumber, "Hunk found before the ---/+++ file header lines");
        continue;
      }
      if (block.reader.start(line, lineNumber)) state = "in-hunk";
      continue;
    }

    if (block.reader.started) {
      block.reader.stray(line, lineNumber);
      continue;
    }

    readHeaderLine(block, line, lineNumber, markMalformed);
  }

  if (block) finalizeBlock(block, lines.length, files, errors);

  return Object.freeze({ files: Object.freeze(files), errors: Object.freeze(errors) });
}

function readHeaderLine(
  block: FileBlock,
  line: string,
  lineNumber: number,
  markMalformed: (block: FileBlock, lineNumber: number, message: string) => void
): void {
  if (block.expectPlus && !line.startsWith("+++ ")) {
    markMalformed(block, lineNumber, "--- line is not followed by a +++ line");
    return;
  }

  if (line.startsWith("--- ")) {
    block.minusPath = parseSidePath(line.slice(4), "a/");
    block.expectPlus = true;
  } else if (line.startsWith("+++ ")) {
    if (block.minusPath === undefined) {
      markMalformed(block, lineNumber, "+++ line without a preceding --- line");
      return;
    }
    block.plusPath = parseSidePath(line.slice(4), "b/");
    block.expectPlus = false;
  } else if (line.startsWith("new file mode ")) {
    block.newFileMode = true;
  } else if (line.startsWith("deleted file mode ")) {
    block.deletedFileMode = true;
  } else if (line.startsWith("old mode ") || line.startsWith("new mode ")) {
    block.modeChange = true;
  } else if (line.startsWith("rename from ")) {
    block.renameFrom = unquotePath(line.slice("rename from ".length));
  } else if (line.startsWith("rename to ")) {
    block.renameTo = unquotePath(line.slice("rename to ".length));
  } else if (line.startsWith("copy to ")) {
    block.copyTo = unquotePath(line.slice("copy to ".length));
  } else if (line === "GIT binary patch") {
    block.binary = true;
  } else {
    const binary = BINARY_FILES.exec(line);
    if (binary) {
      block.binary = true;
      block.minusPath ??= parseSidePath(binary[1], "a/");
      block.plusPath ??= parseSidePath(binary[2], "b/");
    }
  }
}

function finalizeBlock(
  block: FileBlock,
  lineNumber: number,
  files: FileDiff[],
  errors: DiffParseError[]
): void {
  block.reader.finish(lineNumber);

  if (!block.malformed && block.expectPlus) {
    block.malformed = {
      kind: "malformed-file-header",
      lineNumber,
      path: blockPath(block),
      message: "--- line is not followed by a +++ line",
    };
  }

  const hasContent =
    block.binary ||
    block.plusPath !== undefined ||
    block.renameTo !== undefined ||
    block.copyTo !== undefined ||
    block.newFileMode ||
    block.deletedFileMode ||
    block.modeChange;

  const oldSide = block.renameFrom ?? block.minusPath ?? block.gitOldPath;
  const newSide = block.renameTo ?? block.copyTo ?? block.plusPath ?? block.gitNewPath;
  const added = block.minusPath === null || block.newFileMode;
  const deleted = block.plusPath === null || block.deletedFileMode;
  const newPath = newSide ?? oldSide;
  const oldPath = oldSide ?? newSide;

  if (!block.malformed && (!hasContent || !newPath || !oldPath)) {
    block.malformed = {
      kind: "malformed-file-header",
      lineNumber: block.headerLine,
      path: blockPath(block),
      message: hasContent
        ? "Could not determine the file path"
        : "diff --git block has no file header or hunks",
    };
  }

  if (block.malformed || !newPath || !oldPath) {
    if (block.malformed) errors.push(block.malformed);
    return;
  }

  let status: FileStatus;
  let hunks: Hunk[] = block.reader.hunks;
  let paths: [oldPath: string, newPath: string];

  if (block.binary) {
    status = "binary";
    hunks = [];
    paths = [added ? newPath : oldPath, deleted ? oldPath : newPath];
  } else if (added) {
    status = "added";
    hunks = [synthesizeAddedHunk(hunks)];
    paths = [newPath, newPath];
  } else if (deleted) {
    status = "deleted";
    hunks = dropNewSideHunks(hunks, oldPath, lineNumber, errors);
    paths = [oldPath, oldPath];
  } else if (block.copyTo === undefined && oldPath !== newPath) {
    status = "renamed";
    paths = [oldPath, newPath];
  } else {
    status = "modified";
    paths = [newPath, newPath];
  }

  files.push(freezeFile({ oldPath: paths[0], newPath: paths[1], status, hunks }));
}

/** Added files carry one hunk spanning the whole new file */
function synthesizeAddedHunk(hunks: readonly Hunk[]): Hunk {
  const total = hunks.reduce((sum, hunk) => sum + hunk.newCount, 0);
  return { oldStart: 0, oldCount: 0, newStart: total > 0 ? 1 : 0, newCount: total };
}

export interface FilePatch {
  filename: string;
  /** Hosting-service file status: added, removed, modified, renamed, copied, changed, unchanged */
  status: string;
  /** Hunk-only patch text, absent for binary or oversized files */
  patch?: string;
  previousFilename?: string;
  additions?: number;
  deletions?: number;
}

/**
 * Builds a FileDiff from a per-file patch as returned by a pull request
 * files listing, which carries hunks but no `diff --git` header.
 */
export function parseFilePatch(file: FilePatch): { file: FileDiff; errors: DiffParseError[] } {
  const errors: DiffParseError[] = [];
  const reader = createHunkReader((lineNumber, message) =>
    errors.push({ kind: "malformed-hunk-header", lineNumber, path: file.filename, message })
  );

  const lines = file.patch ? file.patch.split(/\r?\n/) : [];
  lines.forEach((line, i) => {
    const lineNumber = i + 1;
    if (reader.open && reader.consume(line, lineNumber)) return;
    if (line.startsWith("@@")) {
      reader.start(line, lineNumber);
    } else {
      reader.stray(line, lineNumber);
    }
  });
  reader.finish(lines.length);

  const oldPath = file.previousFilename ?? file.filename;
  const status = patchStatus(file);
  const omitted = !file.patch && (file.additions ?? 0) + (file.deletions ?? 0) > 0;

  switch (status) {
    case "added":
      return {
        file: freezeFile({ oldPath: file.filename, newPath: file.filename, status, hunks: [synthesizeAddedHunk(reader.hunks)] }),
        errors,
      };
    case "deleted":
      return {
        file: freezeFile({ oldPath: file.filename, newPath: file.filename, status, hunks: dropNewSideHunks(reader.hunks, file.filename, lines.length, errors) }),
        errors,
      };
    case "binary":
    case "renamed": {
      const diff: FileDiff = { oldPath, newPath: file.filename, status, hunks: reader.hunks };
      if (omitted) diff.patchOmitted = true;
      return { file: freezeFile(diff), errors };
    }
    case "modified":
      return {
        file: freezeFile({ oldPath: file.filename, newPath: file.filename, status, hunks: reader.hunks }),
        errors,
      };
  }
}

export function diffSetFromFiles(patches: readonly FilePatch[]): DiffSet {
  const files: FileDiff[] = [];
  const errors: DiffParseError[] = [];
  for (const patch of patches) {
    const parsed = parseFilePatch(patch);
    files.push(parsed.file);
    errors.push(...parsed.errors);
  }
  return Object.freeze({ files: Object.freeze(files), errors: Object.freeze(errors) });
}

/** A deleted file has no new side; hunks that claim one are reported and dropped */
function dropNewSideHunks(hunks: Hunk[], path: string, lineNumber: number, errors: DiffParseError[]): Hunk[] {
  return hunks.filter((hunk) => {
    if (hunk.newCount === 0) return true;
    errors.push({
      kind: "malformed-hunk-header",
      lineNumber,
      path,
      message: `Deleted file has a hunk with new-side lines (+${hunk.newStart},${hunk.newCount})`,
    });
    return false;
  });
}

function patchStatus(file: FilePatch): FileStatus {
  switch (file.status) {
    case "removed":
      return "deleted";
    case "added":
      return file.patch || file.additions === 0 ? "added" : "binary";
    case "renamed":
      // Pure renames come without a patch
      if (file.previousFilename && file.previousFilename !== file.filename) return "renamed";
      return file.patch ? "modified" : "binary";
    default:
      return file.patch ? "modified" : "binary";
  }
}

interface HunkReader {
  readonly hunks: Hunk[];
  /** A hunk body is being consumed */
  readonly open: boolean;
  /** At least one hunk header has been seen */
  readonly started: boolean;
  start(line: string, lineNumber: number): boolean;
  /** Returns false when the line cannot belong to the open hunk */
  consume(line: string, lineNumber: number): boolean;
  /** Handles a line seen between hunks */
  stray(line: string, lineNumber: number): void;
  finish(lineNumber: number): void;
}

interface OpenHunk {
  hunk: Hunk;
  headerLine: number;
  oldLeft: number;
  newLeft: number;
}

function createHunkReader(report: (lineNumber: number, message: string) => void): HunkReader {
  const hunks: Hunk[] = [];
  let current: OpenHunk | null = null;
  let lastClosed: Hunk | null = null;
  let discarding = false;
  let started = false;

  const drop = (lineNumber: number, message: string): void => {
    report(lineNumber, message);
    current = null;
    lastClosed = null;
    discarding = true;
  };

  const truncated = (open: OpenHunk): string =>
    `Hunk at line ${open.headerLine} ends early: ${open.hunk.oldCount - open.oldLeft}/${open.hunk.oldCount} old and ` +
    `${open.hunk.newCount - open.newLeft}/${open.hunk.newCount} new lines present`;

  return {
    hunks,
    get open() {
      return current !== null;
    },
    get started() {
      return started;
    },

    start(line, lineNumber) {
      started = true;
      lastClosed = null;
      discarding = false;

      const hunk = parseHunkHeader(line);
      if (!hunk) {
        drop(lineNumber, `Malformed hunk header: ${line}`);
        return false;
      }
      if (hunk.oldCount === 0 && hunk.newCount === 0) {
        hunks.push(hunk);
        lastClosed = hunk;
        return false;
      }
      current = { hunk, headerLine: lineNumber, oldLeft: hunk.oldCount, newLeft: hunk.newCount };
      return true;
    },

    consume(line, lineNumber) {
      if (!current) return false;

      const marker = line.charAt(0);
      if (marker === "\\") return true;

      let oldStep = 0;
      let newStep = 0;
      if (marker === "+") {
        newStep = 1;
      } else if (marker === "-") {
        oldStep = 1;
      } else if (marker === " " || line === "") {
        oldStep = 1;
        newStep = 1;
      } else {
        drop(lineNumber, truncated(current));
        return false;
      }

      if (current.oldLeft < oldStep || current.newLeft < newStep) {
        drop(lineNumber, `Hunk at line ${current.headerLine} has more lines than its header declares`);
        return true;
      }

      current.oldLeft -= oldStep;
      current.newLeft -= newStep;
      if (current.oldLeft === 0 && current.newLeft === 0) {
        hunks.push(current.hunk);
        lastClosed = current.hunk;
        current = null;
      }
      return true;
    },

    stray(line, lineNumber) {
      if (discarding) return;
      const marker = line.charAt(0);
      if (marker !== "+" && marker !== "-" && marker !== " ") return;
      if (lastClosed) {
        hunks.splice(hunks.indexOf(lastClosed), 1);
        drop(lineNumber, "Hunk has more lines than its header declares");
      }
    },

    finish(lineNumber) {
      if (current) drop(lineNumber, truncated(current));
    },
  };
}

/** Parses `@@ -a,b +c,d @@`; omitted counts default to 1 */
export function parseHunkHeader(line: string): Hunk | null {
  const match = HUNK_HEADER.exec(line);
  if (!match) return null;

  const [oldStart, oldCount, newStart, newCount] = [match[1], match[2] ?? "1", match[3], match[4] ?? "1"].map(Number);
  if (![oldStart, oldCount, newStart, newCount].every(Number.isSafeInteger)) return null;

  return { oldStart, oldCount, newStart, newCount };
}

function parseGitHeaderPaths(line: string): [string, string] | null {
  const rest = line.slice("diff --git ".length);

  if (rest.includes('"')) {
    const quoted = /^("(?:[^"\\]|\\.)*"|\S+) ("(?:[^"\\]|\\.)*"|\S+)$/.exec(rest);
    if (!quoted) return null;
    return [stripPrefix(unquotePath(quoted[1]), "a/"), stripPrefix(unquotePath(quoted[2]), "b/")];
  }

  // Unrenamed files repeat the same path on both sides, which disambiguates spaces
  if (rest.startsWith("a/") && (rest.length - 5) % 2 === 0) {
    const length = (rest.length - 5) / 2;
    const path = rest.slice(2, 2 + length);
    if (rest.slice(2 + length) === ` b/${path}`) return [path, path];
  }

  const split = /^a\/(.+?) b\/(.+)$/.exec(rest);
  return split ? [split[1], split[2]] : null;
}

function parseSidePath(value: string, prefix: string): string | null {
  const tab = value.indexOf("\t");
  const path = unquotePath((tab === -1 ? value : value.slice(0, tab)).trimEnd());
  if (path === DEV_NULL) return null;
  return stripPrefix(path, prefix);
}

function stripPrefix(path: string, prefix: string): string {
  return path.startsWith(prefix) ? path.slice(prefix.length) : path;
}

const C_ESCAPES: Record<string, string> = {
  a: "\x07",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v",
};

/** Decodes git's C-style quoting, including octal-escaped UTF-8 bytes */
function unquotePath(value: string): string {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) return value;

  const body = value.slice(1, -1);
  const chunks: Buffer[] = [];
  let i = 0;
  while (i < body.length) {
    const slash = body.indexOf("\\", i);
    const end = slash === -1 ? body.length : slash;
    if (end > i) chunks.push(Buffer.from(body.slice(i, end), "utf8"));
    if (slash === -1) break;

    const octal = /^[0-7]{3}/.exec(body.slice(slash + 1, slash + 4));
    if (octal) {
      chunks.push(Buffer.from([parseInt(octal[0], 8)]));
      i = slash + 4;
      continue;
    }
    const escaped = body.charAt(slash + 1);
    chunks.push(Buffer.from(C_ESCAPES[escaped] ?? escaped, "utf8"));
    i = slash + 2;
  }
  return Buffer.concat(chunks).toString("utf8");
}

function blockPath(block: FileBlock): string | undefined {
  return (
    block.renameTo ??
    block.copyTo ??
    block.plusPath ??
    block.minusPath ??
    block.gitNewPath ??
    block.gitOldPath
  );
}

function freezeFile(file: FileDiff): FileDiff {
  return Object.freeze({ ...file, hunks: Object.freeze(file.hunks.map((hunk) => Object.freeze({ ...hunk }))) });
}
