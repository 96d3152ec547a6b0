import { fileURLToPath } from "node:url";

export type CallSite = {
  file: string;
  line: number;
};

// "at fn (/path/file.ts:12:5)" or "at /path/file.ts:12:5"
const FRAME_PATTERN = /\(?(?<file>[^()\s]+?):(?<line>\d+):\d+\)?$/;

/**
 * Source location of whoever called `below`.
 * Returns null when the runtime gives no parseable stack frame.
 */
export function captureCallSite(
  below: (...args: never[]) => unknown,
): CallSite | null {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, below);
  const frame = holder.stack
    ?.split("\n")
    .map((line) => line.trim())
    .find((line) => line.startsWith("at "));
  if (!frame) return null;

  const groups = FRAME_PATTERN.exec(frame)?.groups;
  if (!groups) return null;

  const raw = groups.file;
  const file = raw.startsWith("file://") ? fileURLToPath(raw) : raw;
  return { file, line: Number(groups.line) };
}
