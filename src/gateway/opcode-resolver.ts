import { z } from 'zod';

import { decodeDispatch } from './dispatch-registry.js';
import { GatewayDecodeError } from './errors.js';
import type { GatewayEvent } from './events.js';
import { GatewayOpcode, hasField, type FrameEnvelope } from './frame.js';

const HelloSchema = z.object({
  heartbeat_interval: z.number().int().positive(),
});

export type DecodeResult =
  | { success: true; event: GatewayEvent }
  | { success: false; error: GatewayDecodeError };

// Only dispatch frames name an event.
function rejectDispatchType(frame: FrameEnvelope): void {
  if (hasField(frame.t)) throw GatewayDecodeError.format('t');
}

function resolveDispatch(frame: FrameEnvelope): GatewayEvent {
  if (!hasField(frame.d)) throw GatewayDecodeError.format('d');
  if (!hasField(frame.t)) throw GatewayDecodeError.format('t');

  return {
    type: 'dispatch',
    sequence: hasField(frame.s) ? frame.s : null,
    event: decodeDispatch(frame.t, frame.d),
  };
}

function resolveInvalidSession(frame: FrameEnvelope): GatewayEvent {
  if (typeof frame.d !== 'boolean') throw GatewayDecodeError.format('d');
  return { type: 'invalid-session', resumable: frame.d };
}

function resolveHello(frame: FrameEnvelope): GatewayEvent {
  if (!hasField(frame.d)) throw GatewayDecodeError.format('d');

  const parsed = HelloSchema.safeParse(frame.d);
  if (!parsed.success) throw GatewayDecodeError.format('heartbeat_interval', parsed.error.issues);

  return { type: 'hello', heartbeatInterval: parsed.data.heartbeat_interval };
}

/**
 * Classify a frame by opcode and, for dispatch frames, decode its event.
 *
 * Pure and synchronous. Throws `GatewayDecodeError`; see
 * `safeDecodeGatewayFrame` for the non-throwing form.
 */
export function decodeGatewayFrame(frame: FrameEnvelope): GatewayEvent {
  switch (frame.op) {
    case GatewayOpcode.Dispatch:
      return resolveDispatch(frame);
    case GatewayOpcode.Heartbeat:
      rejectDispatchType(frame);
      return { type: 'heartbeat-request' };
    case GatewayOpcode.Reconnect:
      rejectDispatchType(frame);
      return { type: 'reconnect' };
    case GatewayOpcode.InvalidSession:
      rejectDispatchType(frame);
      return resolveInvalidSession(frame);
    case GatewayOpcode.Hello:
      rejectDispatchType(frame);
      return resolveHello(frame);
    case GatewayOpcode.HeartbeatAck:
      rejectDispatchType(frame);
      return { type: 'heartbeat-ack' };
    default:
      throw GatewayDecodeError.unexpectedOpcode(frame.op);
  }
}

export function safeDecodeGatewayFrame(frame: FrameEnvelope): DecodeResult {
  try {
    return { success: true, event: decodeGatewayFrame(frame) };
  } catch (err) {
    if (err instanceof GatewayDecodeError) {
      return { success: false, error: err };
    }
    throw err;
  }
}
