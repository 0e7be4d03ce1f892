import { z } from 'zod';

import { GuildMemberSchema } from './member.js';

export const VoiceStateSchema = z.object({
  guild_id: z.string().optional(),
  /** Null once the user has left voice. */
  channel_id: z.string().nullable(),
  user_id: z.string(),
  member: GuildMemberSchema.optional(),
  session_id: z.string(),
  deaf: z.boolean(),
  mute: z.boolean(),
  self_deaf: z.boolean(),
  self_mute: z.boolean(),
  self_stream: z.boolean().optional(),
  self_video: z.boolean(),
  suppress: z.boolean(),
  request_to_speak_timestamp: z.string().nullish(),
});

export type VoiceState = z.infer<typeof VoiceStateSchema>;

export const VoiceServerSchema = z.object({
  token: z.string(),
  guild_id: z.string(),
  /** Null while the voice server is being reallocated. */
  endpoint: z.string().nullable(),
});

export type VoiceServer = z.infer<typeof VoiceServerSchema>;
