import type { Embed } from '../models/embed.js';
import { parseMessage, type Message } from '../models/message.js';
import type { User } from '../models/user.js';

import type { RestClient } from './rest-client.js';

export type OutboxEntry =
  | { type: 'message'; channelId: string; payload: { content: string; messageId: string } }
  | { type: 'embed'; channelId: string; payload: { embed: Embed; messageId: string } }
  | { type: 'reaction'; channelId: string; payload: { messageId: string; emoji: string } }
  | { type: 'delete'; channelId: string; payload: { messageId: string } }
  | { type: 'pin'; channelId: string; payload: { messageId: string } }
  | { type: 'unpin'; channelId: string; payload: { messageId: string } };

export interface OutboxClientOptions {
  /** Author stamped on synthesized messages. */
  author?: User;
  /** Clock for synthesized timestamps. */
  now?: () => Date;
}

const DEFAULT_AUTHOR: User = {
  id: 'outbox-bot',
  username: 'outbox',
  discriminator: '0000',
  bot: true,
};

/**
 * In-memory REST handle: records every request into `outbox` and answers
 * sends with a synthesized message. For dry runs and tests.
 */
export function createOutboxRestClient(outbox: OutboxEntry[], options: OutboxClientOptions = {}): RestClient {
  const author = options.author ?? DEFAULT_AUTHOR;
  const now = options.now ?? (() => new Date());
  let counter = 0;

  const synthesize = (channelId: string, content: string, embeds: Embed[]): Message => {
    counter += 1;
    return parseMessage({
      id: `outbox-${counter}`,
      channel_id: channelId,
      author,
      content,
      timestamp: now().toISOString(),
      edited_timestamp: null,
      tts: false,
      mention_everyone: false,
      mentions: [],
      mention_roles: [],
      attachments: [],
      embeds,
      pinned: false,
      type: 0,
    });
  };

  return {
    async sendMessage(channelId: string, content: string): Promise<Message> {
      const message = synthesize(channelId, content, []);
      outbox.push({ type: 'message', channelId, payload: { content, messageId: message.id } });
      return message;
    },

    async sendEmbed(channelId: string, embed: Embed): Promise<Message> {
      const message = synthesize(channelId, '', [embed]);
      outbox.push({ type: 'embed', channelId, payload: { embed, messageId: message.id } });
      return message;
    },

    async addReaction(channelId: string, messageId: string, emoji: string): Promise<void> {
      outbox.push({ type: 'reaction', channelId, payload: { messageId, emoji } });
    },

    async deleteMessage(channelId: string, messageId: string): Promise<void> {
      outbox.push({ type: 'delete', channelId, payload: { messageId } });
    },

    async pinMessage(channelId: string, messageId: string): Promise<void> {
      outbox.push({ type: 'pin', channelId, payload: { messageId } });
    },

    async unpinMessage(channelId: string, messageId: string): Promise<void> {
      outbox.push({ type: 'unpin', channelId, payload: { messageId } });
    },
  };
}
