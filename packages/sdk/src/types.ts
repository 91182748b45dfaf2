/**
 * SDK type definitions.
 */

import type { Agent } from 'node:http';
import type { ClientLogger } from './logger.js';

/** Chat, user or peer reference: numeric id or `@username`. */
export type ChatId = number | string;

export interface TelegramClientOptions {
  /** API server URL (default: http://localhost:8080) */
  baseUrl?: string;
  /** Per-request timeout in ms (default: 30000) */
  timeout?: number;
  /** Log sink (default: console, debug lines off) */
  logger?: ClientLogger;
  /** Emit one debug line per request through the default logger */
  debug?: boolean;
  /** Connection agent. When omitted the client creates and owns a keep-alive agent. */
  agent?: Agent;
}

/**
 * Response envelope returned by every endpoint except /health.
 */
export interface Envelope {
  success?: boolean;
  /** Either a JSON-encoded string or an already structured value */
  data?: unknown;
  error?: string | null;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean;

export interface HealthStatus {
  status?: string;
  [key: string]: unknown;
}

// Per-operation options. Fields left undefined never reach the wire.

export interface PageOptions {
  /** default: 1 */
  page?: number;
  /** default: 20 */
  pageSize?: number;
}

export interface ListChatsOptions {
  /** default: 50 */
  limit?: number;
  chatType?: string;
  /** default: false */
  archived?: boolean;
  /** default: false */
  unreadOnly?: boolean;
}

export interface SendMessageOptions {
  replyTo?: number;
  /** e.g. 'md' or 'html' */
  parseMode?: string;
}

export interface DeleteMessageOptions {
  /** Delete for everyone (default: true) */
  revoke?: boolean;
}

export interface SearchMessagesOptions {
  /** default: 20 */
  limit?: number;
  fromUser?: ChatId;
}

export interface SearchContactsOptions {
  /** default: 10 */
  limit?: number;
}

export interface AddContactOptions {
  lastName?: string;
}

export interface ParticipantsOptions {
  /** default: 100 */
  limit?: number;
  /** default: 0 */
  offset?: number;
}

export interface PromoteAdminOptions {
  /** Custom admin title */
  title?: string;
}

export interface BanUserOptions {
  /** Unix timestamp; permanent when omitted */
  untilDate?: number;
}

export interface MuteChatOptions {
  /** Unix timestamp; muted indefinitely when omitted */
  muteUntil?: number;
}

export interface SaveDraftOptions {
  replyTo?: number;
}
