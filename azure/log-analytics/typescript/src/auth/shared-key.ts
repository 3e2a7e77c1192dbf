/**
 * Azure Log Analytics Shared Key Authentication
 *
 * Implements shared key signing for the HTTP Data Collector API.
 */

import { createHmac } from "crypto";
import { ConfigurationError } from "../errors.js";

/** Resource path covered by the signature, independent of the query string. */
export const SIGNED_RESOURCE = "/api/logs";

/** Content type of every ingestion request. */
export const CONTENT_TYPE = "application/json";

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Headers produced by signing a request.
 */
export interface SignedHeaders {
  Authorization: string;
  "x-ms-date": string;
}

/**
 * Decode the base64 workspace key into raw signing bytes.
 *
 * @throws ConfigurationError if the key is empty or not canonical base64
 */
export function decodeWorkspaceKey(workspaceKey: string): Buffer {
  if (workspaceKey.length === 0 || !BASE64_PATTERN.test(workspaceKey)) {
    throw new ConfigurationError(
      "Workspace key must be a non-empty base64 string",
      "InvalidWorkspaceKey"
    );
  }
  return Buffer.from(workspaceKey, "base64");
}

/**
 * Build the canonical string to sign.
 *
 * The layout is fixed: verb, content length, content type, the x-ms-date
 * header and the resource, separated by newlines.
 */
export function buildStringToSign(contentLength: number, date: string): string {
  return ["POST", contentLength.toString(), CONTENT_TYPE, `x-ms-date:${date}`, SIGNED_RESOURCE].join(
    "\n"
  );
}

/**
 * Sign the string with HMAC-SHA256 and base64-encode the digest.
 */
export function sign(stringToSign: string, key: Buffer): string {
  const hmac = createHmac("sha256", key);
  hmac.update(stringToSign, "utf8");
  return hmac.digest("base64");
}

/**
 * Format the Authorization header value.
 */
export function buildAuthorizationHeader(workspaceId: string, signature: string): string {
  return `SharedKey ${workspaceId}:${signature}`;
}

/**
 * Shared key auth provider bound to one workspace.
 */
export class SharedKeyAuthProvider {
  private readonly workspaceId: string;
  private readonly signingKey: Buffer;

  constructor(workspaceId: string, workspaceKey: string) {
    this.workspaceId = workspaceId;
    this.signingKey = decodeWorkspaceKey(workspaceKey);
  }

  /**
   * Sign a request body of the given byte length sent at `date`.
   *
   * @param date - RFC1123 date, sent unchanged as the x-ms-date header
   */
  signRequest(contentLength: number, date: string): SignedHeaders {
    const signature = sign(buildStringToSign(contentLength, date), this.signingKey);
    return {
      Authorization: buildAuthorizationHeader(this.workspaceId, signature),
      "x-ms-date": date,
    };
  }
}

/**
 * Create a shared key auth provider.
 */
export function createSharedKeyAuth(workspaceId: string, workspaceKey: string): SharedKeyAuthProvider {
  return new SharedKeyAuthProvider(workspaceId, workspaceKey);
}
