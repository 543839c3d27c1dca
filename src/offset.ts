import { OffsetEstimate, QueryResult } from './ntp-data';
import { OverflowError } from './errors';

function checked(operation: string, a: number, b: number, result: number): number {
  if (!Number.isSafeInteger(a) || !Number.isSafeInteger(b) || !Number.isSafeInteger(result))
    throw new OverflowError(operation, a, b);

  return result;
}

export function safeAdd(a: number, b: number): number {
  return checked('+', a, b, a + b);
}

export function safeSubtract(a: number, b: number): number {
  return checked('-', a, b, a - b);
}

/**
 * Offset is remote time minus the midpoint of the local send and receive times, so a positive offset means the
 * local clock is behind. The midpoint is truncated toward zero.
 */
export function computeOffset(q: QueryResult): OffsetEstimate {
  const avgLocalMs = Math.trunc(safeAdd(q.localSendMs, q.localRecvMs) / 2);

  return {
    offsetMs: safeSubtract(q.remoteMs, avgLocalMs),
    rttMs: safeSubtract(q.localRecvMs, q.localSendMs)
  };
}
