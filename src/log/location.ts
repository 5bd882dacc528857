/**
 * Call-site capture.
 *
 * Fatal records carry the location of the check that failed, not the
 * location inside this library. V8's Error.captureStackTrace drops every
 * frame above (and including) the given function, so the first remaining
 * frame is the caller of that function.
 */

import { fileURLToPath } from "node:url";

export interface SourceLocation {
  readonly file: string;
  readonly line: number;
  readonly column: number;
}

export const UNKNOWN_LOCATION: SourceLocation = {
  file: "<unknown>",
  line: 0,
  column: 0,
};

// Matches "    at fn (/path/to/file.ts:12:5)" and "    at /path/to/file.ts:12:5".
const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):(\d+)\)?$/;

/**
 * Parses one V8 stack frame line. Returns undefined for frames without a
 * file position (e.g. "at new Promise (<anonymous>)").
 */
export function parseStackFrame(frame: string): SourceLocation | undefined {
  const match = FRAME_PATTERN.exec(frame);
  if (match === null) {
    return undefined;
  }
  const [, rawFile, line, column] = match;
  if (rawFile === undefined || line === undefined || column === undefined) {
    return undefined;
  }
  const file = rawFile.startsWith("file://") ? fileURLToPath(rawFile) : rawFile;
  return { file, line: Number(line), column: Number(column) };
}

/**
 * Location of the code that called `below`.
 */
export function callerLocation(
  below: (...args: never[]) => unknown,
): SourceLocation {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, below);
  const frames = (holder.stack ?? "").split("\n").slice(1);
  for (const frame of frames) {
    const location = parseStackFrame(frame);
    if (location !== undefined) {
      return location;
    }
  }
  return UNKNOWN_LOCATION;
}

export function formatLocation(location: SourceLocation): string {
  return `${location.file}:${location.line}`;
}
