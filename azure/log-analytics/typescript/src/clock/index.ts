/**
 * Time source and wire date formats.
 */

/**
 * Source of the current instant.
 */
export interface Clock {
  now(): Date;
}

/**
 * Wall-clock time source.
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

/**
 * RFC1123 date in GMT, as sent in the x-ms-date header.
 *
 * @example
 * toRfc1123(new Date("2024-03-05T09:07:02Z")); // "Tue, 05 Mar 2024 09:07:02 GMT"
 */
export function toRfc1123(date: Date): string {
  return date.toUTCString();
}

/**
 * RFC3339 timestamp in UTC at second precision.
 *
 * @example
 * toRfc3339(new Date("2024-03-05T09:07:02.450Z")); // "2024-03-05T09:07:02Z"
 */
export function toRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Whether the value holds a real instant.
 */
export function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}
