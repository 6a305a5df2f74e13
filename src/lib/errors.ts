/**
 * Fatal error types. Anything recoverable (bad cache file, failed fetch,
 * malformed results) is logged and degraded instead of thrown.
 */

export class TitleSourceError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Unable to read titles from ${path}: ${errorMessage(cause)}`, { cause });
    this.name = "TitleSourceError";
    this.path = path;
  }
}

export class DataDirectoryError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Unable to create data directory ${path}: ${errorMessage(cause)}`, { cause });
    this.name = "DataDirectoryError";
    this.path = path;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(["Invalid configuration:", ...issues.map((issue) => `  - ${issue}`)].join("\n"));
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
