/**
 * Transport layer for the Log Analytics client.
 *
 * The default implementation issues requests through an undici Agent, so one
 * client shares a single connection pool across concurrent posts.
 *
 * @module transport
 */

import { Agent, type Dispatcher, errors, request } from "undici";
import { TransportError } from "../errors.js";

/** Request timeout in milliseconds. */
export const REQUEST_TIMEOUT_MS = 30000;

/**
 * HTTP request handed to a transport.
 */
export interface HttpRequest {
  method: "POST";
  url: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * HTTP response returned by a transport, body fully read.
 */
export interface HttpResponse {
  status: number;
  /** Lower-cased header names. */
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport interface for HTTP communication.
 *
 * Implementations reject with TransportError when no response arrives;
 * any status code counts as a response.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
  close(): Promise<void>;
}

/**
 * undici transport options.
 */
export interface UndiciTransportOptions {
  /** Whole-request timeout in milliseconds. */
  timeoutMs?: number;
  /** Defaults to a dedicated Agent using the same timeout. */
  dispatcher?: Dispatcher;
}

/**
 * undici-based HTTP transport.
 */
export class UndiciTransport implements HttpTransport {
  private readonly dispatcher: Dispatcher;
  private readonly timeoutMs: number;

  constructor(options: UndiciTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        connectTimeout: this.timeoutMs,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
  }

  async send(httpRequest: HttpRequest): Promise<HttpResponse> {
    const signal = AbortSignal.timeout(this.timeoutMs);

    try {
      const response = await request(httpRequest.url, {
        method: httpRequest.method,
        headers: httpRequest.headers,
        body: httpRequest.body,
        dispatcher: this.dispatcher,
        signal,
      });

      const body = await response.body.text();

      return {
        status: response.statusCode,
        headers: normalizeHeaders(response.headers),
        body,
      };
    } catch (error) {
      if (signal.aborted || isTimeoutError(error)) {
        throw new TransportError(`Request timeout after ${this.timeoutMs}ms`, "Timeout", {
          cause: error,
        });
      }

      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Failed to post request: ${reason}`, "ConnectionFailed", {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}

function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof errors.ConnectTimeoutError ||
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError
  );
}

function normalizeHeaders(
  headers: Record<string, string | string[] | undefined>
): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    normalized[key.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
  }
  return normalized;
}

/**
 * Create the default transport.
 */
export function createDefaultTransport(timeoutMs?: number): HttpTransport {
  return new UndiciTransport({ timeoutMs });
}
