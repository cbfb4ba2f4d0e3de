export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Configuration could not be read, parsed or validated. */
export class ConfigError extends PipelineError {}

/** A condition that stops the run before any worker starts, such as an empty input set. */
export class FatalRunError extends PipelineError {}

export class HttpStatusError extends PipelineError {
  readonly statusCode: number;

  constructor(statusCode: number, url: string) {
    super(`HTTP ${statusCode} for ${url}`);
    this.statusCode = statusCode;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return error instanceof Error && "code" in error && typeof error.code === "string" && codes.includes(error.code);
}

export function isNotFoundError(error: unknown): boolean {
  return hasErrorCode(error, "ENOENT");
}
