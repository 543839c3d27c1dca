import { abs } from '@tubular/math';
import { DateTime } from '@tubular/time';
import { ClockSetter } from './clock-setter';
import { Config } from './config';
import { OffsetEstimate, QueryResult } from './ntp-data';
import {
  ClockSetError, ExitCode, ImplausibleYearError, PrivilegeDeniedError, RoundTripOutOfRangeError
} from './errors';
import { safeAdd } from './offset';

export const MAX_ROUND_TRIP = 10_000;
export const MIN_ADJUSTMENT = 500;
export const MIN_YEAR = 2025;
export const MAX_YEAR = 2200;

export interface ClockCapabilities {
  isPrivileged(): boolean;
  clockSetter: ClockSetter;
}

export type Decision =
  | { kind: 'skip'; offsetMs: number }
  | { kind: 'reject'; error: RoundTripOutOfRangeError | ImplausibleYearError | ClockSetError }
  | { kind: 'test-noop'; newTimeMs: number }
  | { kind: 'deny'; error: PrivilegeDeniedError; newTimeMs: number }
  | { kind: 'apply'; newTimeMs: number };

// Calendar year in UTC
export function remoteYear(remoteMs: number): number {
  return new DateTime(remoteMs, 'UTC').get('year');
}

// Half the round trip is added to the server transmit time to account for the one-way delay of the reply.
export function correctedTime(result: QueryResult, estimate: OffsetEstimate): number {
  return safeAdd(result.remoteMs, Math.trunc(estimate.rttMs / 2));
}

export async function decide(result: QueryResult, estimate: OffsetEstimate, config: Pick<Config, 'testOnly'>,
                             capabilities: ClockCapabilities): Promise<Decision> {
  if (estimate.rttMs < 0 || estimate.rttMs > MAX_ROUND_TRIP)
    return { kind: 'reject', error: new RoundTripOutOfRangeError(estimate.rttMs) };

  if (abs(estimate.offsetMs) < MIN_ADJUSTMENT)
    return { kind: 'skip', offsetMs: estimate.offsetMs };

  const year = remoteYear(result.remoteMs);

  if (year < MIN_YEAR || year > MAX_YEAR)
    return { kind: 'reject', error: new ImplausibleYearError(year) };

  const newTimeMs = correctedTime(result, estimate);

  if (config.testOnly)
    return { kind: 'test-noop', newTimeMs };

  if (!capabilities.isPrivileged())
    return { kind: 'deny', error: new PrivilegeDeniedError(), newTimeMs };

  try {
    await capabilities.clockSetter.set(newTimeMs);
  }
  catch (err) {
    return { kind: 'reject', error: err instanceof ClockSetError ? err : new ClockSetError(capabilities.clockSetter.method, err) };
  }

  return { kind: 'apply', newTimeMs };
}

export function exitCodeFor(decision: Decision): ExitCode {
  switch (decision.kind) {
    case 'reject':
    case 'deny':
      return decision.error.exitCode;
    default:
      return ExitCode.SUCCESS;
  }
}
