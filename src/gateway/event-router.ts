import { logger } from '../middleware/logger.js';

import { GatewayDecodeError } from './errors.js';
import type { DispatchEvent, DispatchEventOf, DispatchPayloadMap, DispatchType, GatewayEvent } from './events.js';
import { parseFrameEnvelope } from './frame.js';
import { safeDecodeGatewayFrame, type DecodeResult } from './opcode-resolver.js';

type MaybePromise<T> = T | Promise<T>;

export type DispatchHandlers = {
  [K in DispatchType]?: (payload: DispatchPayloadMap[K], sequence: number | null) => MaybePromise<void>;
};

export interface GatewayEventHandlers {
  /** Per-tag dispatch handlers. */
  dispatch?: DispatchHandlers;
  /** Runs before the per-tag handler for every dispatch, e.g. to track the sequence number. */
  onAnyDispatch?: (event: DispatchEvent, sequence: number | null) => MaybePromise<void>;
  onHello?: (heartbeatInterval: number) => MaybePromise<void>;
  onHeartbeatAck?: () => MaybePromise<void>;
  onHeartbeatRequest?: () => MaybePromise<void>;
  onReconnect?: () => MaybePromise<void>;
  onInvalidSession?: (resumable: boolean) => MaybePromise<void>;
  /** Decode failures; the frame is skipped either way. */
  onDecodeError?: (error: GatewayDecodeError, frame: unknown) => MaybePromise<void>;
}

async function routeDispatch<K extends DispatchType>(
  handlers: DispatchHandlers,
  event: DispatchEventOf<K>,
  sequence: number | null,
): Promise<void> {
  const handler = handlers[event.type];
  if (handler) {
    await handler(event.payload, sequence);
  }
}

async function invokeHandlers(event: GatewayEvent, handlers: GatewayEventHandlers): Promise<void> {
  switch (event.type) {
    case 'dispatch':
      await handlers.onAnyDispatch?.(event.event, event.sequence);
      if (handlers.dispatch) {
        await routeDispatch(handlers.dispatch, event.event, event.sequence);
      }
      return;
    case 'hello':
      await handlers.onHello?.(event.heartbeatInterval);
      return;
    case 'heartbeat-ack':
      await handlers.onHeartbeatAck?.();
      return;
    case 'heartbeat-request':
      await handlers.onHeartbeatRequest?.();
      return;
    case 'reconnect':
      await handlers.onReconnect?.();
      return;
    case 'invalid-session':
      await handlers.onInvalidSession?.(event.resumable);
      return;
    default: {
      const unreachable: never = event;
      throw new Error(`Unhandled gateway event: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Deliver one decoded event to the matching handler.
 * A handler that throws is logged and the error is re-thrown to the caller.
 */
export async function routeGatewayEvent(event: GatewayEvent, handlers: GatewayEventHandlers): Promise<void> {
  logger.debug({
    type: event.type,
    dispatchType: event.type === 'dispatch' ? event.event.type : undefined,
    sequence: event.type === 'dispatch' ? event.sequence : undefined,
  }, 'Routing gateway event');

  try {
    await invokeHandlers(event, handlers);
  } catch (err) {
    logger.error({ err, type: event.type }, 'Gateway event handler failed');
    throw err;
  }
}

function logDecodeFailure(error: GatewayDecodeError): void {
  if (error.kind === 'unrecognized-dispatch-type') {
    logger.warn({ dispatchType: error.subject }, 'Skipping unrecognized dispatch type');
    return;
  }

  logger.error({
    err: error,
    kind: error.kind,
    subject: error.subject,
    opcode: error.opcode,
  }, 'Failed to decode gateway frame');
}

/**
 * Decode one frame handed over by the transport and route the result.
 *
 * Decode failures are logged, passed to `onDecodeError` and returned; they
 * never reach the event handlers. Callers must hand frames over in the
 * order they were received.
 */
export async function handleGatewayFrame(frame: unknown, handlers: GatewayEventHandlers): Promise<DecodeResult> {
  let result: DecodeResult;
  try {
    result = safeDecodeGatewayFrame(parseFrameEnvelope(frame));
  } catch (err) {
    if (!(err instanceof GatewayDecodeError)) throw err;
    result = { success: false, error: err };
  }

  if (!result.success) {
    logDecodeFailure(result.error);
    await handlers.onDecodeError?.(result.error, frame);
    return result;
  }

  await routeGatewayEvent(result.event, handlers);
  return result;
}
