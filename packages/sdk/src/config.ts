/**
 * Client defaults and environment configuration.
 *
 *   TELEGRAM_API_URL         base URL of the API server
 *   TELEGRAM_API_TIMEOUT_MS  per-request timeout in ms
 *   TELEGRAM_CLIENT_DEBUG    '1' or 'true' to log every request
 */

import { TelegramClientError } from './errors.js';
import type { TelegramClientOptions } from './types.js';

export const DEFAULT_BASE_URL = 'http://localhost:8080';
export const DEFAULT_TIMEOUT_MS = 30_000;
/** Largest delay setTimeout accepts; anything above fires after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Strip trailing slashes so endpoint paths can be appended directly. */
export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}

function parseTimeout(raw: string | undefined): number {
  if (!raw) return DEFAULT_TIMEOUT_MS;
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) return DEFAULT_TIMEOUT_MS;
  return Math.min(value, MAX_TIMEOUT_MS);
}

/**
 * Validate a caller-supplied timeout. Values above MAX_TIMEOUT_MS
 * (Infinity included) are clamped; zero, negatives and NaN are rejected.
 */
export function resolveTimeout(timeout: number | undefined): number {
  if (timeout === undefined) return DEFAULT_TIMEOUT_MS;
  if (Number.isNaN(timeout) || timeout <= 0) {
    throw new TelegramClientError(`Invalid timeout: ${timeout} (must be a positive number of ms)`);
  }
  return Math.min(Math.ceil(timeout), MAX_TIMEOUT_MS);
}

/**
 * Read client options from the environment.
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): TelegramClientOptions {
  const debug = (env.TELEGRAM_CLIENT_DEBUG || '').toLowerCase();
  return {
    baseUrl: normalizeBaseUrl(env.TELEGRAM_API_URL || DEFAULT_BASE_URL),
    timeout: parseTimeout(env.TELEGRAM_API_TIMEOUT_MS),
    debug: debug === '1' || debug === 'true',
  };
}
