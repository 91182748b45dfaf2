/**
 * Telegram API client: typed wrapper over the Telegram HTTP API service.
 *
 * @example
 * ```typescript
 * import { withClient } from 'telegram-api-client';
 *
 * await withClient({ baseUrl: 'http://localhost:8080' }, async (client) => {
 *   const chats = await client.listChats({ limit: 5 });
 *   await client.sendMessage(123456789, 'Hello!', { parseMode: 'md' });
 * });
 * ```
 *
 * @packageDocumentation
 */

export { TelegramClient, withClient, getClient } from './client.js';
export { TelegramClientError } from './errors.js';
export type { TelegramClientErrorOptions } from './errors.js';
export { loadClientConfig, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './config.js';
export { createConsoleLogger } from './logger.js';
export type { ClientLogger } from './logger.js';
export { decodeData, unwrapEnvelope } from './envelope.js';
export type {
  TelegramClientOptions,
  ChatId,
  Envelope,
  HealthStatus,
  PageOptions,
  ListChatsOptions,
  SendMessageOptions,
  DeleteMessageOptions,
  SearchMessagesOptions,
  SearchContactsOptions,
  AddContactOptions,
  ParticipantsOptions,
  PromoteAdminOptions,
  BanUserOptions,
  MuteChatOptions,
  SaveDraftOptions,
} from './types.js';
