/**
 * Convenience actions on a received message. Each one forwards to the REST
 * handle it is given, using the message's channel (and id) as context, and
 * lets the handle's failure propagate unchanged. None of them touch the
 * message value itself.
 */

import type { Embed } from '../models/embed.js';
import type { Message } from '../models/message.js';
import type { RestClient } from '../rest/rest-client.js';

/** Post a new message to the same channel. */
export async function send(message: Message, http: RestClient, content: string): Promise<Message> {
  return http.sendMessage(message.channel_id, content);
}

/** Post an embed to the same channel. */
export async function sendEmbed(message: Message, http: RestClient, embed: Embed): Promise<Message> {
  return http.sendEmbed(message.channel_id, embed);
}

export async function addReaction(message: Message, http: RestClient, emoji: string): Promise<void> {
  return http.addReaction(message.channel_id, message.id, emoji);
}

/** React to a sibling message in the same channel. */
export async function addReactionToMessage(
  message: Message,
  http: RestClient,
  messageId: string,
  emoji: string,
): Promise<void> {
  return http.addReaction(message.channel_id, messageId, emoji);
}

/** Delete this message. */
export async function remove(message: Message, http: RestClient): Promise<void> {
  return http.deleteMessage(message.channel_id, message.id);
}

/** `message.pinned` keeps its decoded value; a MESSAGE_UPDATE or CHANNEL_PINS_UPDATE reports the change. */
export async function pin(message: Message, http: RestClient): Promise<void> {
  return http.pinMessage(message.channel_id, message.id);
}

export async function unpin(message: Message, http: RestClient): Promise<void> {
  return http.unpinMessage(message.channel_id, message.id);
}
