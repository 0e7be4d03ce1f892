import type { Channel } from '../models/channel.js';
import type { Guild, UnavailableGuild } from '../models/guild.js';
import type { Message, MessageUpdate } from '../models/message.js';
import type { Presence } from '../models/presence.js';
import type { User } from '../models/user.js';
import type { VoiceServer, VoiceState } from '../models/voice.js';

import type { ChannelPinsUpdate } from './payloads/channel.js';
import type {
  GuildBan,
  GuildEmojisUpdate,
  GuildIntegrationsUpdate,
  GuildMemberAdd,
  GuildMemberRemove,
  GuildMemberUpdate,
  GuildMembersChunk,
  GuildRoleDelete,
  GuildRoleEvent,
} from './payloads/guild.js';
import type {
  MessageDelete,
  MessageDeleteBulk,
  MessageReactionAdd,
  MessageReactionRemove,
  MessageReactionRemoveAll,
  MessageReactionRemoveEmoji,
} from './payloads/message.js';
import type { TypingStart } from './payloads/presence.js';
import type { Ready } from './payloads/ready.js';

/**
 * Payload type carried by each dispatch tag. `RESUMED` and `RECONNECT`
 * carry no payload.
 */
export interface DispatchPayloadMap {
  READY: Ready;
  RESUMED: null;
  RECONNECT: null;

  // Channel
  CHANNEL_CREATE: Channel;
  CHANNEL_UPDATE: Channel;
  CHANNEL_DELETE: Channel;
  CHANNEL_PINS_UPDATE: ChannelPinsUpdate;

  // Guild
  GUILD_CREATE: Guild;
  GUILD_UPDATE: Guild;
  GUILD_DELETE: UnavailableGuild;
  GUILD_BAN_ADD: GuildBan;
  GUILD_BAN_REMOVE: GuildBan;
  GUILD_EMOJIS_UPDATE: GuildEmojisUpdate;
  GUILD_INTEGRATIONS_UPDATE: GuildIntegrationsUpdate;
  GUILD_MEMBER_ADD: GuildMemberAdd;
  GUILD_MEMBER_REMOVE: GuildMemberRemove;
  GUILD_MEMBER_UPDATE: GuildMemberUpdate;
  GUILD_MEMBERS_CHUNK: GuildMembersChunk;
  GUILD_ROLE_CREATE: GuildRoleEvent;
  GUILD_ROLE_UPDATE: GuildRoleEvent;
  GUILD_ROLE_DELETE: GuildRoleDelete;

  // Message
  MESSAGE_CREATE: Message;
  MESSAGE_UPDATE: MessageUpdate;
  MESSAGE_DELETE: MessageDelete;
  MESSAGE_DELETE_BULK: MessageDeleteBulk;
  MESSAGE_REACTION_ADD: MessageReactionAdd;
  MESSAGE_REACTION_REMOVE: MessageReactionRemove;
  MESSAGE_REACTION_REMOVE_ALL: MessageReactionRemoveAll;
  MESSAGE_REACTION_REMOVE_EMOJI: MessageReactionRemoveEmoji;

  // Presence
  PRESENCE_UPDATE: Presence;
  TYPING_START: TypingStart;
  USER_UPDATE: User;

  // Voice
  VOICE_STATE_UPDATE: VoiceState;
  VOICE_SERVER_UPDATE: VoiceServer;
}

export type DispatchType = keyof DispatchPayloadMap;

export interface DispatchEventOf<K extends DispatchType> {
  type: K;
  payload: DispatchPayloadMap[K];
}

export type DispatchEvent = { [K in DispatchType]: DispatchEventOf<K> }[DispatchType];

/** Outcome of classifying one frame by its opcode. */
export type GatewayEvent =
  | { type: 'dispatch'; sequence: number | null; event: DispatchEvent }
  | { type: 'heartbeat-request' }
  | { type: 'reconnect' }
  | { type: 'invalid-session'; resumable: boolean }
  | { type: 'hello'; heartbeatInterval: number }
  | { type: 'heartbeat-ack' };

export type GatewayEventType = GatewayEvent['type'];
