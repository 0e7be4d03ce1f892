import { z } from 'zod';

import { GatewayDecodeError } from './errors.js';

// https://discord.com/developers/docs/topics/opcodes-and-status-codes#gateway-gateway-opcodes
export const GatewayOpcode = {
  Dispatch: 0, // Receive: an event was dispatched
  Heartbeat: 1, // Send/Receive: heartbeat, or the server asking for one now
  Identify: 2, // Send
  PresenceUpdate: 3, // Send
  VoiceStateUpdate: 4, // Send
  Resume: 6, // Send
  Reconnect: 7, // Receive: reconnect and resume immediately
  RequestGuildMembers: 8, // Send
  InvalidSession: 9, // Receive: session invalidated, `d` says whether it is resumable
  Hello: 10, // Receive: first frame, carries heartbeat_interval
  HeartbeatAck: 11, // Receive
} as const;

export type GatewayOpcode = (typeof GatewayOpcode)[keyof typeof GatewayOpcode];

/**
 * One decoded unit of the gateway stream, as handed over by the transport.
 * JSON `null` in `d`, `s` or `t` means the field is absent.
 */
export interface FrameEnvelope {
  op: number;
  d?: unknown;
  s?: number | null;
  t?: string | null;
}

const FrameEnvelopeSchema = z.object({
  op: z.number().int(),
  d: z.unknown().optional(),
  s: z.number().int().nullish(),
  t: z.string().nullish(),
});

export function parseFrameEnvelope(raw: unknown): FrameEnvelope {
  const parsed = FrameEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const field = first && typeof first.path[0] === 'string' ? first.path[0] : 'frame';
    throw GatewayDecodeError.format(field, parsed.error.issues);
  }

  return parsed.data;
}

export function parseFrameText(text: string): FrameEnvelope {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw GatewayDecodeError.format('frame', [{
      code: 'custom',
      path: [],
      message: err instanceof Error ? err.message : String(err),
    }]);
  }

  return parseFrameEnvelope(raw);
}

/** Present means neither undefined nor JSON null. */
export function hasField<T>(value: T | null | undefined): value is T {
  return value !== undefined && value !== null;
}
