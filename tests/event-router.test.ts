import { beforeEach, describe, expect, it, vi } from 'vitest';

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('../src/middleware/logger.js', () => ({ logger: loggerMock }));

import { GatewayDecodeError } from '../src/gateway/errors.js';
import { handleGatewayFrame, routeGatewayEvent } from '../src/gateway/event-router.js';
import type { DispatchEvent } from '../src/gateway/events.js';

import { dispatchFrame, messagePayload } from './helpers/gateway-fixtures.js';

beforeEach(() => {
  vi.clearAllMocks();
});

describe('handleGatewayFrame', () => {
  it('routes a dispatch to its per-tag handler with the sequence number', async () => {
    const order: string[] = [];
    const onMessageCreate = vi.fn((payload: { content: string }, sequence: number | null) => {
      order.push(`create:${payload.content}:${sequence}`);
    });
    const onGuildDelete = vi.fn();

    const result = await handleGatewayFrame(dispatchFrame('MESSAGE_CREATE', messagePayload(), 7), {
      onAnyDispatch: (event: DispatchEvent, sequence) => {
        order.push(`any:${event.type}:${sequence}`);
      },
      dispatch: {
        MESSAGE_CREATE: onMessageCreate,
        GUILD_DELETE: onGuildDelete,
      },
    });

    expect(result.success).toBe(true);
    expect(order).toEqual(['any:MESSAGE_CREATE:7', 'create:hello there:7']);
    expect(onGuildDelete).not.toHaveBeenCalled();
  });

  it('routes control frames', async () => {
    const onHello = vi.fn();
    const onInvalidSession = vi.fn();
    const onHeartbeatAck = vi.fn();
    const onHeartbeatRequest = vi.fn();
    const onReconnect = vi.fn();
    const handlers = { onHello, onInvalidSession, onHeartbeatAck, onHeartbeatRequest, onReconnect };

    await handleGatewayFrame({ op: 10, d: { heartbeat_interval: 41250 }, s: null, t: null }, handlers);
    await handleGatewayFrame({ op: 9, d: false }, handlers);
    await handleGatewayFrame({ op: 11 }, handlers);
    await handleGatewayFrame({ op: 1, d: null }, handlers);
    await handleGatewayFrame({ op: 7, d: null }, handlers);

    expect(onHello).toHaveBeenCalledWith(41250);
    expect(onInvalidSession).toHaveBeenCalledWith(false);
    expect(onHeartbeatAck).toHaveBeenCalledTimes(1);
    expect(onHeartbeatRequest).toHaveBeenCalledTimes(1);
    expect(onReconnect).toHaveBeenCalledTimes(1);
  });

  it('logs and reports an unrecognized dispatch type, then carries on', async () => {
    const onDecodeError = vi.fn();
    const onAnyDispatch = vi.fn();
    const frame = dispatchFrame('SOME_FUTURE_EVENT', { id: '1' });

    const result = await handleGatewayFrame(frame, { onDecodeError, onAnyDispatch });

    expect(result.success).toBe(false);
    expect(onAnyDispatch).not.toHaveBeenCalled();
    expect(loggerMock.warn).toHaveBeenCalledWith(
      { dispatchType: 'SOME_FUTURE_EVENT' },
      'Skipping unrecognized dispatch type',
    );
    expect(onDecodeError).toHaveBeenCalledTimes(1);
    const [error, seenFrame] = onDecodeError.mock.calls[0] ?? [];
    expect(error).toBeInstanceOf(GatewayDecodeError);
    expect(seenFrame).toBe(frame);
  });

  it('logs format errors at error level', async () => {
    const result = await handleGatewayFrame({ op: 9, d: 'x' }, {});

    expect(result.success).toBe(false);
    if (result.success) throw new Error('Expected a failed decode');
    expect(result.error.subject).toBe('d');
    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ kind: 'format', subject: 'd' }),
      'Failed to decode gateway frame',
    );
  });

  it('rejects a malformed envelope', async () => {
    const result = await handleGatewayFrame({ op: 'zero' }, {});

    if (result.success) throw new Error('Expected a failed decode');
    expect(result.error.kind).toBe('format');
    expect(result.error.subject).toBe('op');
  });

  it('handles frames in the order they are given', async () => {
    const seen: Array<number | null> = [];
    const handlers = {
      onAnyDispatch: async (_event: DispatchEvent, sequence: number | null) => {
        await new Promise((resolve) => setTimeout(resolve, sequence === 1 ? 10 : 0));
        seen.push(sequence);
      },
    };

    for (const s of [1, 2, 3]) {
      await handleGatewayFrame(dispatchFrame('RESUMED', {}, s), handlers);
    }

    expect(seen).toEqual([1, 2, 3]);
  });
});

describe('routeGatewayEvent', () => {
  it('logs and rethrows a failing handler', async () => {
    const failure = new Error('handler exploded');

    await expect(routeGatewayEvent({ type: 'heartbeat-ack' }, {
      onHeartbeatAck: () => {
        throw failure;
      },
    })).rejects.toBe(failure);

    expect(loggerMock.error).toHaveBeenCalledWith(
      { err: failure, type: 'heartbeat-ack' },
      'Gateway event handler failed',
    );
  });

  it('ignores events without a handler', async () => {
    await expect(routeGatewayEvent({ type: 'reconnect' }, {})).resolves.toBeUndefined();
  });
});
