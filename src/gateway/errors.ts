import type { ZodIssue } from 'zod';

export type GatewayDecodeErrorKind = 'format' | 'unrecognized-dispatch-type' | 'unexpected-opcode';

/**
 * Failure while classifying or decoding a gateway frame.
 *
 * - `format`: `subject` names the frame field (`op`, `d`, `s`, `t`,
 *   `heartbeat_interval`) or the dispatch tag whose payload did not decode.
 * - `unrecognized-dispatch-type`: `subject` is the unknown tag, verbatim.
 * - `unexpected-opcode`: `opcode` is the opcode that was received.
 */
export class GatewayDecodeError extends Error {
  constructor(
    public readonly kind: GatewayDecodeErrorKind,
    message: string,
    public readonly subject: string | null = null,
    public readonly opcode: number | null = null,
    public readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'GatewayDecodeError';
  }

  static format(subject: string, issues: readonly ZodIssue[] = []): GatewayDecodeError {
    const detail = issues.length > 0 ? `: ${summarizeIssues(issues)}` : '';
    return new GatewayDecodeError('format', `Invalid payload format (${subject})${detail}`, subject, null, issues);
  }

  static unrecognizedDispatchType(dispatchType: string): GatewayDecodeError {
    return new GatewayDecodeError(
      'unrecognized-dispatch-type',
      `Unrecognized dispatch type "${dispatchType}"`,
      dispatchType,
    );
  }

  static unexpectedOpcode(opcode: number): GatewayDecodeError {
    return new GatewayDecodeError('unexpected-opcode', `Unexpected opcode ${opcode}`, null, opcode);
  }
}

export function isGatewayDecodeError(value: unknown): value is GatewayDecodeError {
  return value instanceof GatewayDecodeError;
}

function summarizeIssues(issues: readonly ZodIssue[]): string {
  return issues
    .slice(0, 3)
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
