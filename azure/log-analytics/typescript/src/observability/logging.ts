/**
 * Azure Log Analytics Observability - Logging
 *
 * Diagnostic logging for the client itself. These logs never go to the
 * workspace; they report delivery and retry outcomes to the host process.
 */

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * No-op logger
 */
export class NoOpLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  info(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  error(_message: string, _error?: Error, _context?: Record<string, unknown>): void {
    // No-op
  }
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Console logger, tagged with a component prefix.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly prefix: string = "log-analytics"
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.debug(this.format(LogLevel.DEBUG, message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.format(LogLevel.INFO, message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.format(LogLevel.WARN, message, context));
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const entry = this.format(LogLevel.ERROR, message, context);
      if (error) {
        console.error(entry, error);
      } else {
        console.error(entry);
      }
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.minLevel);
  }

  private format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : "";
    return `[${this.prefix}][${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }
}

/**
 * In-memory logger for testing
 */
export class InMemoryLogger implements Logger {
  private entries: LogEntry[] = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    this.entries.push({
      level,
      message,
      timestamp: new Date(),
      context,
      error,
    });
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }

  getEntriesByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }
}

/**
 * Why a batch was not accepted by the retry queue.
 */
export type RefusalReason = "shutdown" | "full" | "disabled";

/**
 * Log a batch the service accepted.
 *
 * @param attempt - retry attempt that delivered it; omitted for the first post
 */
export function logDelivered(logger: Logger, recordCount: number, attempt?: number): void {
  logger.info(
    `Posted ${recordCount} messages.`,
    attempt === undefined ? undefined : { attempt }
  );
}

/**
 * Log a retry timer being armed.
 */
export function logRetryScheduled(
  logger: Logger,
  attempt: number,
  delayMs: number,
  recordCount: number
): void {
  logger.debug("Scheduled retry", { attempt, delay_ms: delayMs, records: recordCount });
}

/**
 * Log a failed retry attempt. A batch with attempts left is a warning; the
 * last failure is an error carrying the cause.
 *
 * @returns whether the batch is rescheduled
 */
export function logRetryOutcome(
  logger: Logger,
  attempt: number,
  maxAttempts: number,
  recordCount: number,
  error: unknown,
  willRetry: boolean
): boolean {
  const err = toError(error);
  const progress = `Retry ${attempt}/${maxAttempts} failed`;

  if (willRetry) {
    logger.warn(`${progress}, will retry`, { error: err.message, records: recordCount });
  } else {
    logger.error(`${progress}, dropping batch`, err, { records: recordCount });
  }
  return willRetry;
}

/**
 * Log a batch the retry queue refused to hold.
 */
export function logBatchRefused(
  logger: Logger,
  reason: RefusalReason,
  recordCount: number,
  maxPending?: number
): void {
  switch (reason) {
    case "shutdown":
      logger.warn("Retry queue is shut down, dropping batch", { records: recordCount });
      break;
    case "full":
      logger.warn("Retry queue is full, dropping batch", {
        records: recordCount,
        max_pending: maxPending,
      });
      break;
    case "disabled":
      logger.debug("Retries are disabled, dropping batch", { records: recordCount });
      break;
  }
}

/**
 * Log pending retries thrown away by a shutdown without flush.
 */
export function logRetriesDiscarded(logger: Logger, batches: number): void {
  if (batches > 0) {
    logger.warn("Discarding pending retries on shutdown", { batches });
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
