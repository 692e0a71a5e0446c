export type LogkeepErrorKind = "persistence" | "malformed-record" | "configuration";

export abstract class LogkeepError extends Error {
  abstract readonly kind: LogkeepErrorKind;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The backend could not be written or read as a whole: permission denied,
 * disk full, a directory where a file was expected, a broken database.
 */
export class PersistenceError extends LogkeepError {
  readonly kind = "persistence";
  readonly path: string | undefined;
  readonly failures: readonly Error[];

  constructor(
    message: string,
    options: { path?: string; cause?: unknown; failures?: Error[] } = {},
  ) {
    super(message, { cause: options.cause });
    this.path = options.path;
    this.failures = options.failures ?? [];
  }
}

/**
 * One stored record could not be decoded. Reads skip it and carry on.
 */
export class MalformedRecordError extends LogkeepError {
  readonly kind = "malformed-record";

  constructor(
    readonly path: string,
    readonly record: number,
    readonly reason: string,
  ) {
    super(`Malformed record ${record} in ${path}: ${reason}`);
  }
}

export class ConfigurationError extends LogkeepError {
  readonly kind = "configuration";

  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
