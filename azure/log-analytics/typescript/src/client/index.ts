/**
 * Azure Log Analytics Client
 *
 * Posts log messages to a workspace through the HTTP Data Collector API.
 */

import { CONTENT_TYPE, type SharedKeyAuthProvider, createSharedKeyAuth } from "../auth/shared-key.js";
import { type Clock, SystemClock, isValidDate, toRfc1123 } from "../clock/index.js";
import { type LogAnalyticsConfig, buildIngestionUrl, validateConfig } from "../config/index.js";
import {
  LogAnalyticsError,
  TransportError,
  ValidationError,
  isRetryable,
  parseHttpStatusError,
} from "../errors.js";
import { type Logger, NoOpLogger, logDelivered } from "../observability/logging.js";
import {
  type LogMetadata,
  TIMESTAMP_FIELD,
  buildLogRecords,
  serializeRecords,
} from "../records/index.js";
import {
  type RetryQueue,
  type RetryStats,
  type RetryTask,
  type ShutdownOptions,
  createRetryQueue,
} from "../retry/index.js";
import { type HttpResponse, type HttpTransport, createDefaultTransport } from "../transport/index.js";

/**
 * Collaborators a client can be given instead of the defaults.
 */
export interface LogAnalyticsClientOptions {
  /** Defaults to an undici transport with a 30s timeout. */
  transport?: HttpTransport;
  /** Defaults to the system clock. */
  clock?: Clock;
  /** Defaults to a no-op logger. */
  logger?: Logger;
}

/**
 * Log Analytics client.
 *
 * @example
 * ```typescript
 * const client = createClient(LogAnalyticsConfig.fromEnv());
 * await client.postMessages(["service started"]);
 * await client.shutdown({ flush: true });
 * ```
 */
export class LogAnalyticsClient {
  private readonly workspaceId: string;
  private readonly logType: string;
  private readonly metadata: LogMetadata;
  private readonly url: string;
  private readonly auth: SharedKeyAuthProvider;
  private readonly transport: HttpTransport;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly retryQueue: RetryQueue;
  private closed = false;

  /**
   * @throws ConfigurationError when the configuration or workspace key is invalid
   */
  constructor(config: LogAnalyticsConfig, options: LogAnalyticsClientOptions = {}) {
    validateConfig(config);

    this.workspaceId = config.workspaceId;
    this.logType = config.logType;
    this.metadata = Object.freeze({ ...config.metadata });
    this.url = buildIngestionUrl(config);
    this.auth = createSharedKeyAuth(config.workspaceId, config.workspaceKey);
    this.transport = options.transport ?? createDefaultTransport();
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? new NoOpLogger();
    this.retryQueue = createRetryQueue((task) => this.deliver(task), config.retry, this.logger);
  }

  /**
   * Post a single message.
   */
  async postMessage(message: string, timestamp?: Date): Promise<void> {
    return this.postMessages([message], timestamp);
  }

  /**
   * Post messages as one batch, all stamped with the same timestamp.
   *
   * A rejected batch (non-200) is also handed to the retry queue; the
   * returned promise still rejects with the first attempt's error.
   *
   * @param timestamp - defaults to now
   * @throws TransportError when no response arrived
   * @throws HttpStatusError when the service answered with another status than 200
   */
  async postMessages(messages: readonly string[], timestamp?: Date): Promise<void> {
    if (this.closed) {
      throw new LogAnalyticsError("Client has been shut down", "Client.Closed");
    }

    if (timestamp !== undefined && !isValidDate(timestamp)) {
      throw new ValidationError("Timestamp is not a valid date", "InvalidTimestamp");
    }

    for (const message of messages) {
      if (typeof message !== "string") {
        throw new ValidationError("Messages must be strings", "InvalidMessage");
      }
    }

    if (messages.length === 0) {
      this.logger.debug("No messages to post");
      return;
    }

    const records = buildLogRecords(messages, this.metadata, timestamp ?? this.clock.now());
    const batch = serializeRecords(records);

    try {
      await this.deliver(batch);
    } catch (error) {
      if (isRetryable(error)) {
        this.retryQueue.enqueue(batch, error.retryAfter);
      }
      throw error;
    }

    logDelivered(this.logger, batch.recordCount);
  }

  /**
   * Stop retrying and release the connection pool.
   */
  async shutdown(options?: ShutdownOptions): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    await this.retryQueue.shutdown(options);
    await this.transport.close();
  }

  getRetryStats(): RetryStats {
    return this.retryQueue.getStats();
  }

  getIngestionUrl(): string {
    return this.url;
  }

  getWorkspaceId(): string {
    return this.workspaceId;
  }

  /**
   * Sign and send one attempt of a serialized batch.
   */
  private async deliver(batch: RetryTask): Promise<void> {
    const date = toRfc1123(this.clock.now());
    const signed = this.auth.signRequest(batch.contentLength, date);

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: "POST",
        url: this.url,
        headers: {
          Authorization: signed.Authorization,
          "Content-Type": CONTENT_TYPE,
          "Log-Type": this.logType,
          "x-ms-date": signed["x-ms-date"],
          "time-generated-field": TIMESTAMP_FIELD,
        },
        body: batch.body,
      });
    } catch (error) {
      if (error instanceof LogAnalyticsError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Failed to post request: ${reason}`, "ConnectionFailed", {
        cause: error,
      });
    }

    if (response.status !== 200) {
      throw parseHttpStatusError(
        response.status,
        response.body,
        response.headers,
        this.clock.now()
      );
    }
  }
}

/**
 * Create a Log Analytics client.
 */
export function createClient(
  config: LogAnalyticsConfig,
  options?: LogAnalyticsClientOptions
): LogAnalyticsClient {
  return new LogAnalyticsClient(config, options);
}
