/**
 * Errors that stop the whole run before any output is written. Anything that
 * only affects a single row is handled where it happens and never becomes one
 * of these.
 */
export class FatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends FatalError {}

export class InvalidSelectionError extends FatalError {}

export class InputFileError extends FatalError {
  constructor(message: string, readonly filePath: string) {
    super(message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** HTTP status carried by a gaxios/axios style error, if any. */
export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("response" in err && typeof err.response === "object" && err.response !== null) {
    const response: object = err.response;
    if ("status" in response && typeof response.status === "number") return response.status;
  }
  if ("status" in err && typeof err.status === "number") return err.status;
  return undefined;
}
