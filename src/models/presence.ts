import { z } from 'zod';

import { PartialUserSchema } from './user.js';

export const ActivitySchema = z.object({
  name: z.string(),
  /** 0 playing, 1 streaming, 2 listening, 3 watching, 4 custom, 5 competing */
  type: z.number().int(),
  url: z.string().nullish(),
  created_at: z.number().int().optional(),
  timestamps: z.object({
    start: z.number().int().optional(),
    end: z.number().int().optional(),
  }).optional(),
  application_id: z.string().optional(),
  details: z.string().nullish(),
  state: z.string().nullish(),
  emoji: z.object({
    name: z.string(),
    /** Null for a unicode emoji in a custom status. */
    id: z.string().nullish(),
    animated: z.boolean().optional(),
  }).nullish(),
  instance: z.boolean().optional(),
  flags: z.number().int().optional(),
});

export type Activity = z.infer<typeof ActivitySchema>;

export const PresenceStatusSchema = z.enum(['idle', 'dnd', 'online', 'offline']);

export type PresenceStatus = z.infer<typeof PresenceStatusSchema>;

export const ClientStatusSchema = z.object({
  desktop: PresenceStatusSchema.optional(),
  mobile: PresenceStatusSchema.optional(),
  web: PresenceStatusSchema.optional(),
});

export const PresenceSchema = z.object({
  user: PartialUserSchema,
  guild_id: z.string().optional(),
  status: PresenceStatusSchema,
  activities: z.array(ActivitySchema),
  client_status: ClientStatusSchema.optional(),
});

export type Presence = z.infer<typeof PresenceSchema>;
