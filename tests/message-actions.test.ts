import { describe, it, expect, vi } from 'vitest';

import {
  addReaction,
  addReactionToMessage,
  pin,
  remove,
  send,
  sendEmbed,
  unpin,
} from '../src/core/message-actions.js';
import { parseMessage } from '../src/models/message.js';
import { createOutboxRestClient, type OutboxEntry } from '../src/rest/outbox-client.js';
import { RestRequestError, type RestClient } from '../src/rest/rest-client.js';

import { messagePayload } from './helpers/gateway-fixtures.js';

const FIXED_NOW = new Date('2026-02-01T12:00:00.000Z');

function setup(): { outbox: OutboxEntry[]; http: RestClient } {
  const outbox: OutboxEntry[] = [];
  const http = createOutboxRestClient(outbox, { now: () => FIXED_NOW });
  return { outbox, http };
}

function failingClient(error: Error): { http: RestClient; calls: ReturnType<typeof vi.fn> } {
  const calls = vi.fn(async () => {
    throw error;
  });
  return {
    calls,
    http: {
      sendMessage: calls,
      sendEmbed: calls,
      addReaction: calls,
      deleteMessage: calls,
      pinMessage: calls,
      unpinMessage: calls,
    },
  };
}

const message = parseMessage(messagePayload());

describe('Message actions', () => {
  it('send posts to the same channel and returns the new message', async () => {
    const { outbox, http } = setup();

    const sent = await send(message, http, 'pong');

    expect(sent.channel_id).toBe('3001');
    expect(sent.content).toBe('pong');
    expect(sent.id).toBe('outbox-1');
    expect(sent.timestamp).toBe('2026-02-01T12:00:00.000Z');
    expect(outbox).toEqual([{ type: 'message', channelId: '3001', payload: { content: 'pong', messageId: 'outbox-1' } }]);
  });

  it('sendEmbed posts the embed to the same channel', async () => {
    const { outbox, http } = setup();
    const embed = { title: 'Standings', fields: [{ name: 'alice', value: '3 wins', inline: true }] };

    const sent = await sendEmbed(message, http, embed);

    expect(sent.embed).toEqual([embed]);
    expect(outbox[0]).toEqual({ type: 'embed', channelId: '3001', payload: { embed, messageId: 'outbox-1' } });
  });

  it('addReaction reacts to this message', async () => {
    const { outbox, http } = setup();
    await addReaction(message, http, '👍');
    expect(outbox).toEqual([{ type: 'reaction', channelId: '3001', payload: { messageId: '2001', emoji: '👍' } }]);
  });

  it('addReactionToMessage reacts to a sibling message in the same channel', async () => {
    const { outbox, http } = setup();
    await addReactionToMessage(message, http, '1999', 'party:8001');
    expect(outbox).toEqual([{ type: 'reaction', channelId: '3001', payload: { messageId: '1999', emoji: 'party:8001' } }]);
  });

  it('remove deletes this message', async () => {
    const { outbox, http } = setup();
    await remove(message, http);
    expect(outbox).toEqual([{ type: 'delete', channelId: '3001', payload: { messageId: '2001' } }]);
  });

  it('pin and unpin leave the local pinned flag untouched', async () => {
    const { outbox, http } = setup();

    await pin(message, http);
    expect(message.pinned).toBe(false);

    await unpin(message, http);
    expect(message.pinned).toBe(false);

    expect(outbox.map((entry) => entry.type)).toEqual(['pin', 'unpin']);
    expect(outbox.map((entry) => entry.channelId)).toEqual(['3001', '3001']);
  });

  it('can run concurrently on one shared message', async () => {
    const { outbox, http } = setup();
    await Promise.all([addReaction(message, http, 'a'), addReaction(message, http, 'b'), pin(message, http)]);
    expect(outbox).toHaveLength(3);
  });
});

describe('Message action failures', () => {
  it('propagate the collaborator error unchanged, without retrying', async () => {
    const error = new RestRequestError('DELETE', '/channels/3001/messages/2001', 403, '{"message":"Missing Permissions"}');
    const { http, calls } = failingClient(error);

    await expect(remove(message, http)).rejects.toBe(error);
    expect(calls).toHaveBeenCalledTimes(1);
    expect(calls).toHaveBeenCalledWith('3001', '2001');
  });

  it('propagate from every action', async () => {
    const error = new Error('socket hang up');
    const { http, calls } = failingClient(error);

    await expect(send(message, http, 'x')).rejects.toBe(error);
    await expect(sendEmbed(message, http, { title: 'x' })).rejects.toBe(error);
    await expect(addReaction(message, http, 'x')).rejects.toBe(error);
    await expect(addReactionToMessage(message, http, '1', 'x')).rejects.toBe(error);
    await expect(pin(message, http)).rejects.toBe(error);
    await expect(unpin(message, http)).rejects.toBe(error);
    expect(calls).toHaveBeenCalledTimes(6);
  });
});
