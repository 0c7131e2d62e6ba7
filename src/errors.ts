export type ErrorCode =
  | "MISSING_CONFIGURATION"
  | "AUTHENTICATION_ERROR"
  | "API_ERROR"
  | "NETWORK_ERROR"
  | "EMPTY_RESPONSE"
  | "UNEXPECTED_ERROR"
  | "CONFIG_FILE_ERROR"
  | "INVALID_OPTION";

export class StockAnalyzerError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "StockAnalyzerError";
    Error.captureStackTrace(this, this.constructor);
  }
}

export class MissingConfigurationError extends StockAnalyzerError {
  constructor(public readonly key: string) {
    super(`${key} environment variable is not set`, "MISSING_CONFIGURATION");
    this.name = "MissingConfigurationError";
  }
}

export class AuthenticationError extends StockAnalyzerError {
  constructor(message: string, cause?: unknown) {
    super(message, "AUTHENTICATION_ERROR", cause);
    this.name = "AuthenticationError";
  }
}

export class ApiError extends StockAnalyzerError {
  constructor(
    message: string,
    public readonly status: number | undefined,
    cause?: unknown,
  ) {
    super(message, "API_ERROR", cause);
    this.name = "ApiError";
  }
}

export class NetworkError extends StockAnalyzerError {
  constructor(message: string, cause?: unknown) {
    super(message, "NETWORK_ERROR", cause);
    this.name = "NetworkError";
  }
}

export class EmptyResponseError extends StockAnalyzerError {
  constructor(message = "The response contained no text or image content") {
    super(message, "EMPTY_RESPONSE");
    this.name = "EmptyResponseError";
  }
}

export class UnexpectedError extends StockAnalyzerError {
  constructor(cause: unknown) {
    super(errorMessage(cause), "UNEXPECTED_ERROR", cause);
    this.name = "UnexpectedError";
  }

  /** Name of the wrapped error's class, or the `typeof` of a non-Error throw. */
  get causeType(): string {
    return this.cause instanceof Error ? this.cause.name : typeof this.cause;
  }
}

export class ConfigFileError extends StockAnalyzerError {
  constructor(message: string) {
    super(message, "CONFIG_FILE_ERROR");
    this.name = "ConfigFileError";
  }
}

export class InvalidOptionError extends StockAnalyzerError {
  constructor(message: string) {
    super(message, "INVALID_OPTION");
    this.name = "InvalidOptionError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
