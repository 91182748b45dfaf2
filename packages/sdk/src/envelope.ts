/**
 * Envelope handling: `{ success, data, error }` responses.
 *
 * `data` is sometimes a JSON-encoded string and sometimes an already
 * structured value, depending on the endpoint. A non-empty string gets a
 * second JSON decode; when that fails the string is returned untouched.
 */

import { TelegramClientError } from './errors.js';
import type { Envelope } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a response body as JSON. Throws TelegramClientError on non-JSON.
 */
export function parseJsonBody(body: string, status?: number): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new TelegramClientError(`Non-JSON response (${body.slice(0, 80)})`, { status, cause: err });
  }
}

/**
 * Narrow a decoded body to an Envelope. Anything that is not an object
 * becomes an empty envelope, which fails the success check.
 */
export function toEnvelope(value: unknown): Envelope {
  if (!isRecord(value)) return {};
  return {
    success: value.success === true,
    data: value.data,
    error: typeof value.error === 'string' ? value.error : null,
  };
}

/** Error text carried by an envelope-shaped body, if any. */
export function envelopeError(value: unknown): string | undefined {
  const { error } = toEnvelope(value);
  return error ? error : undefined;
}

/**
 * Second decode pass over `data`.
 */
export function decodeData(data: unknown): unknown {
  if (typeof data !== 'string' || data === '') return data;
  try {
    return JSON.parse(data);
  } catch {
    // Plain text payload (e.g. "Message sent")
    return data;
  }
}

/**
 * Unwrap an envelope: throw on `success` false or absent, else return the
 * decoded `data`.
 */
export function unwrapEnvelope(envelope: Envelope): unknown {
  if (!envelope.success) {
    throw new TelegramClientError(envelope.error || 'Unknown error');
  }
  return decodeData(envelope.data);
}

/**
 * Drop undefined and null fields so optional parameters never reach the wire.
 */
export function compact<V>(fields: Record<string, V | undefined | null>): Record<string, V> {
  const out: Record<string, V> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined && value !== null) out[key] = value;
  }
  return out;
}
