/**
 * Azure Log Analytics Error Types
 *
 * Error hierarchy for the Log Analytics data collector client.
 */

/**
 * Base Log Analytics error class.
 */
export class LogAnalyticsError extends Error {
  public readonly code: string;
  public readonly requestId?: string;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: { requestId?: string; retryable?: boolean; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "LogAnalyticsError";
    this.code = code;
    this.requestId = options?.requestId;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, LogAnalyticsError.prototype);
  }

  /**
   * Get retry-after hint in milliseconds if available.
   */
  get retryAfter(): number | undefined {
    return undefined;
  }

  /**
   * HTTP status code if applicable.
   */
  get statusCode(): number | undefined {
    return undefined;
  }
}

export type ConfigurationErrorCode =
  | "InvalidWorkspaceId"
  | "InvalidWorkspaceKey"
  | "InvalidLogType"
  | "InvalidMetadata"
  | "InvalidConfig";

/**
 * Configuration error, raised at client construction.
 */
export class ConfigurationError extends LogAnalyticsError {
  constructor(message: string, code: ConfigurationErrorCode = "InvalidConfig") {
    super(message, `Configuration.${code}`);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Invalid arguments passed to a post operation.
 */
export class ValidationError extends LogAnalyticsError {
  constructor(message: string, code: "InvalidTimestamp" | "InvalidMessage") {
    super(message, `Validation.${code}`);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * The request could not be sent or no response arrived.
 */
export class TransportError extends LogAnalyticsError {
  constructor(message: string, code: "ConnectionFailed" | "Timeout", options?: { cause?: unknown }) {
    super(message, `Transport.${code}`, { retryable: false, cause: options?.cause });
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * The service answered with a status other than 200.
 */
export class HttpStatusError extends LogAnalyticsError {
  public readonly body: string;
  private readonly _statusCode: number;
  private readonly _retryAfter?: number;

  constructor(
    statusCode: number,
    body: string,
    options?: { requestId?: string; retryAfter?: number }
  ) {
    super(`Post log request failed with status: ${statusCode} ${body}`.trimEnd(), `Http.${statusCode}`, {
      requestId: options?.requestId,
      retryable: true,
    });
    this.name = "HttpStatusError";
    this.body = body;
    this._statusCode = statusCode;
    this._retryAfter = options?.retryAfter;
    Object.setPrototypeOf(this, HttpStatusError.prototype);
  }

  override get statusCode(): number {
    return this._statusCode;
  }

  override get retryAfter(): number | undefined {
    return this._retryAfter;
  }
}

/**
 * Build an HttpStatusError from a raw response.
 *
 * `Retry-After` is honored in both its delay-seconds and HTTP-date forms;
 * a date already in the past yields no hint.
 *
 * @param now - reference time for an HTTP-date `Retry-After`
 */
export function parseHttpStatusError(
  status: number,
  body: string,
  headers: Record<string, string>,
  now: Date = new Date()
): HttpStatusError {
  return new HttpStatusError(status, body, {
    requestId: headers["x-ms-request-id"],
    retryAfter: parseRetryAfter(headers["retry-after"], now),
  });
}

function parseRetryAfter(value: string | undefined, now: Date): number | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) {
    return undefined;
  }
  const delay = at - now.getTime();
  return delay > 0 ? delay : undefined;
}

/**
 * Check if an error is retryable.
 */
export function isRetryable(error: unknown): error is LogAnalyticsError {
  return error instanceof LogAnalyticsError && error.retryable;
}
