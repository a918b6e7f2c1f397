export type LogFolderErrorCode = "not_found" | "not_directory" | "unreadable";

/**
 * The input folder cannot be used at all. Raised before any file is parsed.
 */
export class LogFolderError extends Error {
  readonly code: LogFolderErrorCode;
  readonly folder: string;

  constructor(code: LogFolderErrorCode, folder: string, message: string) {
    super(message);
    this.name = "LogFolderError";
    this.code = code;
    this.folder = folder;
  }
}

export class ConfigError extends Error {
  readonly origin: string;

  constructor(origin: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.origin = origin;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
