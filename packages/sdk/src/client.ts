/**
 * TelegramClient: main SDK client.
 *
 * One method per API operation. Every method builds a request, sends it
 * through the client's transport, and unwraps the `{ success, data, error }`
 * envelope. Payload shapes are defined by the API server; pass a type
 * argument to name the one you expect.
 */

import { DEFAULT_BASE_URL, normalizeBaseUrl, resolveTimeout } from './config.js';
import { TelegramClientError, describeTransportError } from './errors.js';
import { compact, envelopeError, parseJsonBody, toEnvelope, unwrapEnvelope } from './envelope.js';
import { createConsoleLogger, type ClientLogger } from './logger.js';
import { HttpTransport, type TransportRequest, type TransportResponse } from './transport.js';
import type {
  AddContactOptions,
  BanUserOptions,
  ChatId,
  DeleteMessageOptions,
  HealthStatus,
  ListChatsOptions,
  MuteChatOptions,
  PageOptions,
  ParticipantsOptions,
  PromoteAdminOptions,
  QueryValue,
  SaveDraftOptions,
  SearchContactsOptions,
  SearchMessagesOptions,
  SendMessageOptions,
  TelegramClientOptions,
} from './types.js';

/** Encode a path parameter. */
function segment(value: ChatId): string {
  return encodeURIComponent(String(value));
}

export class TelegramClient {
  readonly baseUrl: string;
  readonly timeout: number;
  private transport: HttpTransport;
  private logger: ClientLogger;

  constructor(options: TelegramClientOptions = {}) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl || DEFAULT_BASE_URL);
    this.timeout = resolveTimeout(options.timeout);
    this.logger = options.logger || createConsoleLogger(options.debug);
    this.transport = new HttpTransport(this.baseUrl, this.timeout, options.agent);
  }

  get closed(): boolean {
    return this.transport.closed;
  }

  /** Release the underlying connection agent. Idempotent. */
  close(): void {
    this.transport.close();
  }

  // --- Request path ---

  /**
   * Send a request; raise TelegramClientError on transport failure or
   * non-2xx status. Returns the raw response otherwise.
   */
  private async send(req: TransportRequest): Promise<TransportResponse> {
    if (this.transport.closed) {
      throw new TelegramClientError('Client is closed');
    }

    const started = Date.now();
    let res: TransportResponse;
    try {
      res = await this.transport.send(req);
    } catch (err) {
      const message = describeTransportError(err);
      this.logger.warn(`${req.method} ${req.path} failed: ${message}`);
      throw new TelegramClientError(message, { cause: err });
    }

    this.logger.debug(`${req.method} ${req.path} -> ${res.status} (${Date.now() - started}ms)`);

    if (res.status < 200 || res.status >= 300) {
      let detail: string | undefined;
      try {
        detail = envelopeError(JSON.parse(res.body));
      } catch {
        detail = undefined;
      }
      const message = detail || `HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ''}`;
      this.logger.warn(`${req.method} ${req.path} failed: ${message}`);
      throw new TelegramClientError(message, { status: res.status });
    }

    return res;
  }

  private async request<T>(req: TransportRequest): Promise<T> {
    const res = await this.send(req);
    const data = unwrapEnvelope(toEnvelope(parseJsonBody(res.body, res.status)));
    return data as T;
  }

  private getJson<T>(path: string, query?: Record<string, QueryValue | undefined>): Promise<T> {
    return this.request<T>({ method: 'GET', path, query: query && compact(query) });
  }

  /** POST always carries a JSON body, `{}` when there are no fields. */
  private postJson<T>(path: string, body: Record<string, unknown> = {}): Promise<T> {
    return this.request<T>({ method: 'POST', path, body: compact(body) });
  }

  private putJson<T>(path: string, body: Record<string, unknown>): Promise<T> {
    return this.request<T>({ method: 'PUT', path, body: compact(body) });
  }

  /** DELETE without fields sends no body at all. */
  private deleteJson<T>(path: string, body?: Record<string, unknown>): Promise<T> {
    return this.request<T>({ method: 'DELETE', path, body: body && compact(body) });
  }

  // --- Health ---

  /**
   * Check API health. The /health endpoint does not use the envelope, so
   * the decoded body is returned as-is.
   */
  async healthCheck<T = HealthStatus>(): Promise<T> {
    const res = await this.send({ method: 'GET', path: '/health' });
    return parseJsonBody(res.body, res.status) as T;
  }

  // --- Chats ---

  async getChats<T = unknown>(options: PageOptions = {}): Promise<T> {
    return this.getJson<T>('/chats', {
      page: options.page ?? 1,
      page_size: options.pageSize ?? 20,
    });
  }

  /** Filtered chat list with metadata. */
  async listChats<T = unknown>(options: ListChatsOptions = {}): Promise<T> {
    return this.getJson<T>('/chats/list', {
      limit: options.limit ?? 50,
      chat_type: options.chatType,
      archived: options.archived ?? false,
      unread_only: options.unreadOnly ?? false,
    });
  }

  async getChat<T = unknown>(chatId: ChatId): Promise<T> {
    return this.getJson<T>(`/chats/${segment(chatId)}`);
  }

  // --- Messages ---

  async getMessages<T = unknown>(chatId: ChatId, options: PageOptions = {}): Promise<T> {
    return this.getJson<T>(`/chats/${segment(chatId)}/messages`, {
      page: options.page ?? 1,
      page_size: options.pageSize ?? 20,
    });
  }

  async sendMessage<T = unknown>(chatId: ChatId, message: string, options: SendMessageOptions = {}): Promise<T> {
    return this.postJson<T>('/messages/send', {
      chat_id: chatId,
      message,
      reply_to: options.replyTo,
      parse_mode: options.parseMode,
    });
  }

  async editMessage<T = unknown>(chatId: ChatId, messageId: number, newText: string): Promise<T> {
    return this.putJson<T>('/messages/edit', {
      chat_id: chatId,
      message_id: messageId,
      new_text: newText,
    });
  }

  async deleteMessage<T = unknown>(chatId: ChatId, messageId: number, options: DeleteMessageOptions = {}): Promise<T> {
    return this.deleteJson<T>('/messages/delete', {
      chat_id: chatId,
      message_id: messageId,
      revoke: options.revoke ?? true,
    });
  }

  async forwardMessage<T = unknown>(fromChatId: ChatId, toChatId: ChatId, messageId: number): Promise<T> {
    return this.postJson<T>('/messages/forward', {
      from_chat_id: fromChatId,
      to_chat_id: toChatId,
      message_id: messageId,
    });
  }

  async searchMessages<T = unknown>(chatId: ChatId, query: string, options: SearchMessagesOptions = {}): Promise<T> {
    return this.postJson<T>('/messages/search', {
      chat_id: chatId,
      query,
      limit: options.limit ?? 20,
      from_user: options.fromUser,
    });
  }

  // --- Contacts ---

  async listContacts<T = unknown>(): Promise<T> {
    return this.getJson<T>('/contacts');
  }

  /** Search contacts by name or username. */
  async searchContacts<T = unknown>(query: string, options: SearchContactsOptions = {}): Promise<T> {
    return this.getJson<T>('/contacts/search', { query, limit: options.limit ?? 10 });
  }

  async addContact<T = unknown>(phone: string, firstName: string, options: AddContactOptions = {}): Promise<T> {
    return this.postJson<T>('/contacts', {
      phone,
      first_name: firstName,
      last_name: options.lastName,
    });
  }

  async deleteContact<T = unknown>(userId: ChatId): Promise<T> {
    return this.deleteJson<T>(`/contacts/${segment(userId)}`);
  }

  // --- Users ---

  async getMe<T = unknown>(): Promise<T> {
    return this.getJson<T>('/me');
  }

  async getUserStatus<T = unknown>(userId: ChatId): Promise<T> {
    return this.getJson<T>(`/users/${segment(userId)}/status`);
  }

  async resolveUsername<T = unknown>(username: string): Promise<T> {
    return this.getJson<T>(`/resolve/${segment(username)}`);
  }

  // --- Groups ---

  async createGroup<T = unknown>(title: string, users: ChatId[]): Promise<T> {
    return this.postJson<T>('/groups', { title, users });
  }

  async inviteToGroup<T = unknown>(chatId: ChatId, userIds: ChatId[]): Promise<T> {
    return this.postJson<T>('/groups/invite', { chat_id: chatId, user_ids: userIds });
  }

  async leaveChat<T = unknown>(chatId: ChatId): Promise<T> {
    return this.postJson<T>(`/chats/${segment(chatId)}/leave`);
  }

  async getParticipants<T = unknown>(chatId: ChatId, options: ParticipantsOptions = {}): Promise<T> {
    return this.getJson<T>(`/chats/${segment(chatId)}/participants`, {
      limit: options.limit ?? 100,
      offset: options.offset ?? 0,
    });
  }

  // --- Admin ---

  async getAdmins<T = unknown>(chatId: ChatId): Promise<T> {
    return this.getJson<T>(`/chats/${segment(chatId)}/admins`);
  }

  async promoteAdmin<T = unknown>(chatId: ChatId, userId: ChatId, options: PromoteAdminOptions = {}): Promise<T> {
    return this.postJson<T>('/admin/promote', {
      chat_id: chatId,
      user_id: userId,
      title: options.title,
    });
  }

  async banUser<T = unknown>(chatId: ChatId, userId: ChatId, options: BanUserOptions = {}): Promise<T> {
    return this.postJson<T>('/admin/ban', {
      chat_id: chatId,
      user_id: userId,
      until_date: options.untilDate,
    });
  }

  async unbanUser<T = unknown>(chatId: ChatId, userId: ChatId): Promise<T> {
    return this.postJson<T>('/admin/unban', { chat_id: chatId, user_id: userId });
  }

  async getInviteLink<T = unknown>(chatId: ChatId): Promise<T> {
    return this.getJson<T>(`/chats/${segment(chatId)}/invite-link`);
  }

  // --- Notifications & archive ---

  async muteChat<T = unknown>(chatId: ChatId, options: MuteChatOptions = {}): Promise<T> {
    return this.postJson<T>(`/chats/${segment(chatId)}/mute`, { mute_until: options.muteUntil });
  }

  async unmuteChat<T = unknown>(chatId: ChatId): Promise<T> {
    return this.postJson<T>(`/chats/${segment(chatId)}/unmute`);
  }

  async archiveChat<T = unknown>(chatId: ChatId): Promise<T> {
    return this.postJson<T>(`/chats/${segment(chatId)}/archive`);
  }

  async unarchiveChat<T = unknown>(chatId: ChatId): Promise<T> {
    return this.postJson<T>(`/chats/${segment(chatId)}/unarchive`);
  }

  // --- Drafts ---

  async saveDraft<T = unknown>(chatId: ChatId, message: string, options: SaveDraftOptions = {}): Promise<T> {
    return this.postJson<T>('/drafts/save', {
      chat_id: chatId,
      message,
      reply_to: options.replyTo,
    });
  }

  async clearDraft<T = unknown>(chatId: ChatId): Promise<T> {
    return this.deleteJson<T>(`/drafts/${segment(chatId)}`);
  }
}

/**
 * Run `fn` with a fresh client, closing it afterwards whether `fn`
 * resolves or throws.
 */
export async function withClient<R>(
  options: TelegramClientOptions,
  fn: (client: TelegramClient) => Promise<R>,
): Promise<R> {
  const client = new TelegramClient(options);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

/** Convenience constructor. */
export function getClient(baseUrl: string = DEFAULT_BASE_URL): TelegramClient {
  return new TelegramClient({ baseUrl });
}
