/**
 * Azure Log Analytics Integration
 *
 * Ships application log messages to a Log Analytics workspace through the
 * HTTP Data Collector API, signed with the workspace shared key. Batches the
 * service rejects are retried in the background on a bounded backoff.
 *
 * @example
 * ```typescript
 * import { createClient, LogAnalyticsConfig } from '@logship/azure-log-analytics';
 *
 * const client = createClient(
 *   LogAnalyticsConfig.builder()
 *     .workspaceId('my-workspace-id')
 *     .workspaceKey(process.env.WORKSPACE_KEY ?? '')
 *     .logType('AppEvents')
 *     .metadata({ host: 'api-1', region: 'westeurope' })
 *     .build()
 * );
 *
 * await client.postMessage('user signed in');
 * await client.postMessages(['job started', 'job finished'], new Date());
 *
 * // Before exit, give pending retries one last chance
 * await client.shutdown({ flush: true });
 * ```
 */

// Client
export {
  LogAnalyticsClient,
  createClient,
  type LogAnalyticsClientOptions,
} from "./client/index.js";

// Configuration
export {
  LogAnalyticsConfig,
  LogAnalyticsConfigBuilder,
  API_VERSION,
  DEFAULT_INGESTION_HOST,
  DEFAULT_RETRY_CONFIG,
  MAX_LOG_TYPE_LENGTH,
  buildIngestionUrl,
  validateConfig,
  type PartialLogAnalyticsConfig,
  type RetryConfig,
} from "./config/index.js";

// Authentication
export {
  SharedKeyAuthProvider,
  createSharedKeyAuth,
  buildAuthorizationHeader,
  buildStringToSign,
  decodeWorkspaceKey,
  sign,
  CONTENT_TYPE,
  SIGNED_RESOURCE,
  type SignedHeaders,
} from "./auth/shared-key.js";

// Records
export {
  buildLogRecords,
  serializeRecords,
  MESSAGE_FIELD,
  TIMESTAMP_FIELD,
  type LogMetadata,
  type LogRecord,
  type SerializedBatch,
} from "./records/index.js";

// Time
export { SystemClock, toRfc1123, toRfc3339, type Clock } from "./clock/index.js";

// Retry
export {
  RetryQueue,
  createRetryQueue,
  type DeliverFunction,
  type RetryStats,
  type RetryTask,
  type ShutdownOptions,
} from "./retry/index.js";

// Transport
export {
  UndiciTransport,
  createDefaultTransport,
  REQUEST_TIMEOUT_MS,
  type UndiciTransportOptions,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from "./transport/index.js";

// Errors
export {
  LogAnalyticsError,
  ConfigurationError,
  ValidationError,
  TransportError,
  HttpStatusError,
  parseHttpStatusError,
  isRetryable,
  type ConfigurationErrorCode,
} from "./errors.js";

// Observability
export {
  LogLevel,
  ConsoleLogger,
  NoOpLogger,
  InMemoryLogger,
  logBatchRefused,
  logDelivered,
  logRetriesDiscarded,
  logRetryOutcome,
  logRetryScheduled,
  type Logger,
  type LogEntry,
  type RefusalReason,
} from "./observability/logging.js";

// Simulation
export { MockTransport, FixedClock } from "./simulation/index.js";
