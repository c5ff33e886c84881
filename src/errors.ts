export class SysmonReportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The input document is not well-formed XML. */
export class MalformedInputError extends SysmonReportError {}

/** The input path does not exist. */
export class NotFoundError extends SysmonReportError {}

/** The report could not be written. */
export class IOWriteError extends SysmonReportError {}

/** Bad command-line argument, config file or environment value. */
export class ConfigError extends SysmonReportError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
