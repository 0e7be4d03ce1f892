import type { Embed } from '../models/embed.js';
import { parseMessage, type Message } from '../models/message.js';
import { logger } from '../middleware/logger.js';
import { config } from '../utils/config.js';

/**
 * Outbound REST handle used by message actions. Implementations must pass
 * failures through untouched.
 */
export interface RestClient {
  sendMessage(channelId: string, content: string): Promise<Message>;
  sendEmbed(channelId: string, embed: Embed): Promise<Message>;
  addReaction(channelId: string, messageId: string, emoji: string): Promise<void>;
  deleteMessage(channelId: string, messageId: string): Promise<void>;
  pinMessage(channelId: string, messageId: string): Promise<void>;
  unpinMessage(channelId: string, messageId: string): Promise<void>;
}

export class RestRequestError extends Error {
  constructor(
    public readonly method: string,
    public readonly path: string,
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`REST ${method} ${path} failed (${status}): ${body}`);
    this.name = 'RestRequestError';
  }
}

export interface RestClientOptions {
  /** Bot token; falls back to CHAT_BOT_TOKEN. */
  token?: string;
  /** Falls back to CHAT_API_BASE_URL. */
  baseUrl?: string;
}

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

async function apiRequest(
  baseUrl: string,
  token: string,
  method: HttpMethod,
  path: string,
  body?: unknown,
): Promise<unknown> {
  logger.debug({ method, path }, 'REST request');

  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: {
      authorization: `Bot ${token}`,
      'user-agent': config.CHAT_USER_AGENT,
      ...(body !== undefined ? { 'content-type': 'application/json; charset=utf-8' } : {}),
    },
    ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
  });

  if (!response.ok) {
    const text = await response.text();
    logger.warn({ method, path, status: response.status }, 'REST request failed');
    throw new RestRequestError(method, path, response.status, text);
  }

  if (response.status === 204) {
    return null;
  }

  return await response.json();
}

function channelMessagePath(channelId: string, messageId: string): string {
  return `/channels/${encodeURIComponent(channelId)}/messages/${encodeURIComponent(messageId)}`;
}

function pinPath(channelId: string, messageId: string): string {
  return `/channels/${encodeURIComponent(channelId)}/pins/${encodeURIComponent(messageId)}`;
}

export function createRestClient(options: RestClientOptions = {}): RestClient {
  const token = options.token ?? config.CHAT_BOT_TOKEN;
  if (!token) {
    throw new Error('A bot token is required (pass one or set CHAT_BOT_TOKEN)');
  }
  const baseUrl = (options.baseUrl ?? config.CHAT_API_BASE_URL).replace(/\/+$/, '');

  const postMessage = async (channelId: string, body: unknown): Promise<Message> => {
    const created = await apiRequest(baseUrl, token, 'POST', `/channels/${encodeURIComponent(channelId)}/messages`, body);
    return parseMessage(created);
  };

  return {
    async sendMessage(channelId: string, content: string): Promise<Message> {
      return postMessage(channelId, { content });
    },

    async sendEmbed(channelId: string, embed: Embed): Promise<Message> {
      return postMessage(channelId, { embeds: [embed] });
    },

    async addReaction(channelId: string, messageId: string, emoji: string): Promise<void> {
      await apiRequest(
        baseUrl,
        token,
        'PUT',
        `${channelMessagePath(channelId, messageId)}/reactions/${encodeURIComponent(emoji)}/@me`,
      );
    },

    async deleteMessage(channelId: string, messageId: string): Promise<void> {
      await apiRequest(baseUrl, token, 'DELETE', channelMessagePath(channelId, messageId));
    },

    async pinMessage(channelId: string, messageId: string): Promise<void> {
      await apiRequest(baseUrl, token, 'PUT', pinPath(channelId, messageId));
    },

    async unpinMessage(channelId: string, messageId: string): Promise<void> {
      await apiRequest(baseUrl, token, 'DELETE', pinPath(channelId, messageId));
    },
  };
}
