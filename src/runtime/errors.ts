export class BuildInvocationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BuildInvocationError";
  }
}

export class OracleTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`oracle did not answer within ${timeoutMs}ms`);
    this.name = "OracleTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class OracleUnparsableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OracleUnparsableError";
  }
}

export class PatchWriteError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`failed to write ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "PatchWriteError";
    this.filePath = filePath;
  }
}

export class ConfigReadError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`failed to read ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "ConfigReadError";
    this.filePath = filePath;
  }
}

export class SessionExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number) {
    super(`build still failing after ${attempts} repair attempts`);
    this.name = "SessionExhaustedError";
    this.attempts = attempts;
  }
}

export class SourceFetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SourceFetchError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const errorMessage = (error: unknown, fallback = "unknown error"): string =>
  error instanceof Error ? error.message : fallback;
