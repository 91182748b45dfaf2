/**
 * Client error: the one failure kind the SDK raises.
 *
 * Covers transport failures, non-2xx responses and envelopes with
 * `success: false`.
 */

export interface TelegramClientErrorOptions {
  /** HTTP status, when a response was received */
  status?: number;
  cause?: unknown;
}

export class TelegramClientError extends Error {
  readonly status?: number;

  constructor(message: string, options: TelegramClientErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TelegramClientError';
    this.status = options.status;
  }
}

/**
 * Build a readable message from a thrown transport error.
 * Includes the nested cause (e.g. ECONNREFUSED) when there is one.
 */
export function describeTransportError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  const cause = err.cause instanceof Error ? err.cause.message : undefined;
  let message = err.message || code || 'Unknown error';
  if (code && !message.includes(code)) message = `${message} (${code})`;
  if (cause && cause !== err.message) message = `${message} (${cause})`;
  return message;
}
