/**
 * Log record construction and serialization.
 */

import { toRfc3339 } from "../clock/index.js";

/** Record field holding the log text. */
export const MESSAGE_FIELD = "message";

/** Record field holding the event time; also named by the time-generated-field header. */
export const TIMESTAMP_FIELD = "Timestamp";

/**
 * One row sent to the data collector.
 */
export type LogRecord = Record<string, string>;

/**
 * Static fields merged into every record.
 */
export type LogMetadata = Readonly<Record<string, string>>;

/**
 * Build one record per message, in input order.
 *
 * Metadata entries named like the message or timestamp fields are overwritten.
 */
export function buildLogRecords(
  messages: readonly string[],
  metadata: LogMetadata,
  timestamp: Date
): LogRecord[] {
  const formatted = toRfc3339(timestamp);
  return messages.map((message) => ({
    ...metadata,
    [MESSAGE_FIELD]: message,
    [TIMESTAMP_FIELD]: formatted,
  }));
}

/**
 * Serialized request body.
 */
export interface SerializedBatch {
  body: string;
  /** UTF-8 byte length of the body. */
  contentLength: number;
  recordCount: number;
}

/**
 * Serialize records to the JSON array the service expects.
 */
export function serializeRecords(records: readonly LogRecord[]): SerializedBatch {
  const body = JSON.stringify(records);
  return {
    body,
    contentLength: Buffer.byteLength(body, "utf8"),
    recordCount: records.length,
  };
}
