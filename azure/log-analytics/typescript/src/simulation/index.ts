/**
 * Azure Log Analytics Simulation Module
 *
 * In-process stand-ins for the network and the wall clock.
 */

import type { Clock } from "../clock/index.js";
import { TransportError } from "../errors.js";
import type { HttpRequest, HttpResponse, HttpTransport } from "../transport/index.js";

type MockReply = { kind: "response"; response: HttpResponse } | { kind: "error"; error: Error };

/**
 * Mock transport that records requests and answers from a script.
 *
 * Queued replies are consumed in order; once the queue is empty every
 * request gets the default reply (200 with an empty body).
 */
export class MockTransport implements HttpTransport {
  private readonly replies: MockReply[] = [];
  private defaultReply: MockReply = {
    kind: "response",
    response: { status: 200, headers: {}, body: "" },
  };
  private readonly requests: HttpRequest[] = [];
  private closed = false;

  /**
   * Queue a response for the next request.
   */
  respondWith(status: number, body = "", headers: Record<string, string> = {}): this {
    this.replies.push({ kind: "response", response: { status, headers, body } });
    return this;
  }

  /**
   * Queue a connection failure for the next request.
   */
  failWith(error: Error = new TransportError("Failed to post request: connection refused", "ConnectionFailed")): this {
    this.replies.push({ kind: "error", error });
    return this;
  }

  /**
   * Answer every unscripted request with this status.
   */
  setDefaultResponse(status: number, body = ""): this {
    this.defaultReply = { kind: "response", response: { status, headers: {}, body } };
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push({ ...request, headers: { ...request.headers } });
    const reply = this.replies.shift() ?? this.defaultReply;
    if (reply.kind === "error") {
      throw reply.error;
    }
    return { ...reply.response, headers: { ...reply.response.headers } };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  getRequests(): HttpRequest[] {
    return [...this.requests];
  }

  getRequestCount(): number {
    return this.requests.length;
  }

  isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Clock pinned to one instant until moved.
 */
export class FixedClock implements Clock {
  private current: Date;

  constructor(instant: Date | string) {
    this.current = new Date(instant);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(instant: Date | string): void {
    this.current = new Date(instant);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}
