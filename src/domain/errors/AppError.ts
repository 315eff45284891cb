export class AppError extends Error {
  readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ConfigError extends AppError {
  readonly key?: string;

  constructor(message: string, key?: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.key = key;
  }
}

/**
 * Failure talking to the catalog API.
 * A missing status code means the request never got a response.
 */
export class ApiError extends AppError {
  readonly statusCode?: number;
  readonly endpoint: string;

  constructor(message: string, statusCode: number | undefined, endpoint: string, cause?: unknown) {
    super(message, `API_ERROR_${statusCode ?? "UNKNOWN"}`, cause);
    this.statusCode = statusCode;
    this.endpoint = endpoint;
  }

  get isNetworkError(): boolean {
    return this.statusCode === undefined;
  }
}

export class XmlParseError extends AppError {
  readonly document: string;

  constructor(message: string, document: string, cause?: unknown) {
    super(message, "XML_PARSE_ERROR", cause);
    this.document = document;
  }
}

export class DeadlineExceededError extends AppError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`, "DEADLINE_EXCEEDED");
    this.timeoutMs = timeoutMs;
  }
}

export function normalizeError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const prefix = context ? `[${context}] ` : "";
  if (error instanceof Error) {
    return new AppError(`${prefix}${error.message}`, "UNKNOWN_ERROR", error);
  }
  return new AppError(`${prefix}Unexpected error: ${String(error)}`, "UNKNOWN_ERROR", error);
}
