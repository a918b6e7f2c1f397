/**
 * Folder enumeration and file decoding
 */

import * as fs from "fs/promises";
import * as path from "path";
import { TextDecoder } from "util";
import { LogFolderError, describeError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { FileError } from "./types.js";
import { compareText } from "./utils.js";

export interface LogSource {
  /** File name, used as the record source */
  source: string;
  text: string;
}

export interface FolderContents {
  folder: string;
  /** Matching files in enumeration order, readable or not */
  files: string[];
  sources: LogSource[];
  fileErrors: FileError[];
}

export interface ReadFolderOptions {
  extension?: string;
  logger?: Logger;
}

type ReadOutcome = { ok: true; source: LogSource } | { ok: false; error: FileError };

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

async function requireDirectory(folder: string): Promise<void> {
  try {
    const stats = await fs.stat(folder);
    if (!stats.isDirectory()) {
      throw new LogFolderError("not_directory", folder, `Not a directory: ${folder}`);
    }
  } catch (error) {
    if (error instanceof LogFolderError) throw error;
    if (hasErrorCode(error, "ENOENT") || hasErrorCode(error, "ENOTDIR")) {
      throw new LogFolderError("not_found", folder, `Log folder does not exist: ${folder}`);
    }
    throw new LogFolderError("unreadable", folder, `Cannot access log folder ${folder}: ${describeError(error)}`);
  }
}

async function readSource(folder: string, name: string): Promise<ReadOutcome> {
  const filePath = path.join(folder, name);
  try {
    const bytes = await fs.readFile(filePath);
    // fatal: invalid UTF-8 is a file error rather than silently replaced text
    const text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    return { ok: true, source: { source: name, text } };
  } catch (error) {
    return { ok: false, error: { source: name, path: filePath, reason: describeError(error) } };
  }
}

/**
 * Lists the log files of `folder` (sorted by name) and reads them concurrently.
 * Throws LogFolderError when the folder itself is unusable; per-file failures
 * are returned in `fileErrors`.
 */
export async function readLogFolder(folder: string, options: ReadFolderOptions = {}): Promise<FolderContents> {
  const extension = options.extension ?? ".vlog";
  const logger = options.logger ?? silentLogger;

  await requireDirectory(folder);

  let names: string[];
  try {
    const entries = await fs.readdir(folder, { withFileTypes: true });
    names = entries
      .filter((entry) => (entry.isFile() || entry.isSymbolicLink()) && entry.name.endsWith(extension))
      .map((entry) => entry.name)
      .sort(compareText);
  } catch (error) {
    throw new LogFolderError("unreadable", folder, `Cannot list log folder ${folder}: ${describeError(error)}`);
  }

  const outcomes = await Promise.all(names.map((name) => readSource(folder, name)));

  const sources: LogSource[] = [];
  const fileErrors: FileError[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      sources.push(outcome.source);
    } else {
      logger.warn({ file: outcome.error.path, reason: outcome.error.reason }, "skipping unreadable log file");
      fileErrors.push(outcome.error);
    }
  }

  logger.debug({ folder, files: names.length, unreadable: fileErrors.length }, "log folder read");
  return { folder, files: names, sources, fileErrors };
}
