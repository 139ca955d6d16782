import { closeSync, openSync, type Stats, statSync } from "node:fs";
import { defaultContext, type ErrorContext, type ErrorRecord, ok, type Outcome } from "@errtally/core";

export interface OpenedFile {
  readonly path: string;
  readonly size: number;
}

function statPath(path: string): Stats | undefined {
  try {
    return statSync(path, { throwIfNoEntry: false });
  } catch {
    // Unreadable metadata counts as a failed stat
    return undefined;
  }
}

function canOpen(path: string): boolean {
  let fd: number | undefined;
  try {
    fd = openSync(path, "r");
    return true;
  } catch {
    return false;
  } finally {
    if (fd !== undefined) closeSync(fd);
  }
}

/**
 * Try to open every path for reading.
 *
 * A path that is not a regular file records an ESTAT event, one that cannot
 * be opened an EOPEN event. Every event carries the list of files opened so
 * far; it is the same array for all events, so the last payload ends up
 * holding every file that did open.
 *
 * @returns `ok(files)` when every path opened, the record otherwise
 */
export function openFiles(
  paths: readonly string[],
  errors: ErrorContext = defaultContext,
): Outcome<OpenedFile[], OpenedFile[]> {
  const opened: OpenedFile[] = [];
  let record: ErrorRecord<OpenedFile[]> | undefined;

  for (const path of paths) {
    const stats = statPath(path);
    if (!stats?.isFile()) {
      record = errors.raise(record, "ESTAT", path, opened);
      continue;
    }

    if (!canOpen(path)) {
      record = errors.raise(record, "EOPEN", path, opened);
      continue;
    }

    opened.push({ path, size: stats.size });
  }

  return record ?? ok(opened);
}
