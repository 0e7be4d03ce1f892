import { GatewayDecodeError } from '../../src/gateway/errors.js';

export function userPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: '1001',
    username: 'alice',
    discriminator: '0001',
    avatar: null,
    ...overrides,
  };
}

/** Smallest body the platform sends for MESSAGE_CREATE. */
export function messagePayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: '2001',
    channel_id: '3001',
    author: userPayload(),
    content: 'hello there',
    timestamp: '2026-01-05T10:00:00.000000+00:00',
    edited_timestamp: null,
    tts: false,
    mention_everyone: false,
    mentions: [],
    mention_roles: [],
    attachments: [],
    pinned: false,
    ...overrides,
  };
}

export function dispatchFrame(t: string, d: unknown, s: number = 1): { op: number; t: string; d: unknown; s: number } {
  return { op: 0, t, d, s };
}

export function captureDecodeError(fn: () => unknown): GatewayDecodeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof GatewayDecodeError) return err;
    throw err;
  }
  throw new Error('Expected a GatewayDecodeError');
}
