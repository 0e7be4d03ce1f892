import { z } from 'zod';

import { ChannelSchema } from '../../models/channel.js';

export const ChannelCreateSchema = ChannelSchema;
export const ChannelUpdateSchema = ChannelSchema;
export const ChannelDeleteSchema = ChannelSchema;

export const ChannelPinsUpdateSchema = z.object({
  guild_id: z.string().optional(),
  channel_id: z.string(),
  last_pin_timestamp: z.string().nullish(),
});

export type ChannelPinsUpdate = z.infer<typeof ChannelPinsUpdateSchema>;
