/**
 * Errors that abort a whole run
 *
 * Everything recoverable (throttling, stage failures, oracle schema drift)
 * travels as a value instead; only these are thrown.
 */

export class FatalRunError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalRunError";
  }
}

/** Malformed or unreadable configuration */
export class ConfigError extends FatalRunError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Malformed geography (duplicate ids, empty regions, unknown order entries) */
export class GeographyError extends FatalRunError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "GeographyError";
    this.issues = issues;
  }
}

export function isFatalRunError(error: unknown): error is FatalRunError {
  return error instanceof FatalRunError;
}

/**
 * A filesystem error for a path that does not exist
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
