export enum ExitCode {
  SUCCESS = 0,
  INVALID_RESPONSE = 1,
  NETWORK_FAILURE = 2,
  CLOCK_NOT_SET = 10
}

export abstract class TimeSyncError extends Error {
  abstract readonly exitCode: ExitCode;
  readonly retryable: boolean = false;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class UsageError extends TimeSyncError {
  readonly exitCode = ExitCode.INVALID_RESPONSE;
}

// Transport

export class ResolutionError extends TimeSyncError {
  readonly exitCode = ExitCode.NETWORK_FAILURE;

  constructor(readonly host: string, cause?: unknown) {
    super(`Could not resolve ${host}` + (cause ? ': ' + filterError(cause) : ''), cause);
  }
}

export class SendError extends TimeSyncError {
  readonly exitCode = ExitCode.NETWORK_FAILURE;

  constructor(readonly address: string, cause?: unknown) {
    super(`Failed to send NTP request to ${address}` + (cause ? ': ' + filterError(cause) : ''), cause);
  }
}

export class TimeoutError extends TimeSyncError {
  readonly exitCode = ExitCode.NETWORK_FAILURE;
  readonly retryable = true;

  constructor(readonly address: string, readonly timeoutMs: number) {
    super(`No response from ${address} within ${timeoutMs} ms`);
  }
}

export class ShortPacketError extends TimeSyncError {
  readonly exitCode = ExitCode.NETWORK_FAILURE;
  readonly retryable = true;

  constructor(readonly length: number) {
    super(`NTP response too short: ${length} bytes`);
  }
}

// Parser

export abstract class ParseError extends TimeSyncError {
  readonly exitCode = ExitCode.INVALID_RESPONSE;
  readonly retryable = true;
}

export class InvalidModeError extends ParseError {
  constructor(readonly mode: number) {
    super(`Invalid mode in NTP response: ${mode}`);
  }
}

export class InvalidStratumError extends ParseError {
  constructor(readonly refId: string) {
    super(`Invalid stratum in NTP response (kiss of death: ${refId || 'none'})`);
  }
}

export class InvalidVersionError extends ParseError {
  constructor(readonly version: number) {
    super(`Invalid version in NTP response: ${version}`);
  }
}

export class UnsynchronizedError extends ParseError {
  constructor() {
    super('NTP server reports an unsynchronized clock');
  }
}

export class InvalidTimestampError extends ParseError {
  constructor(readonly seconds: number) {
    super(`Invalid transmit timestamp in NTP response: ${seconds}`);
  }
}

// Orchestration

export class RetriesExhaustedError extends TimeSyncError {
  readonly exitCode = ExitCode.NETWORK_FAILURE;

  constructor(readonly server: string, readonly attempts: number, cause?: unknown) {
    super(`Failed to contact NTP server ${server} after ${attempts} attempt${attempts === 1 ? '' : 's'}`, cause);
  }
}

// Calculator

export class OverflowError extends TimeSyncError {
  readonly exitCode = ExitCode.INVALID_RESPONSE;

  constructor(operation: string, a: number, b: number) {
    super(`Arithmetic overflow: ${a} ${operation} ${b}`);
  }
}

// Policy

export class RoundTripOutOfRangeError extends TimeSyncError {
  readonly exitCode = ExitCode.INVALID_RESPONSE;

  constructor(readonly rttMs: number) {
    super(`Invalid roundtrip time: ${rttMs} ms`);
  }
}

export class ImplausibleYearError extends TimeSyncError {
  readonly exitCode = ExitCode.INVALID_RESPONSE;

  constructor(readonly year: number) {
    super(`Remote year is out of valid range (2025-2200): ${year}`);
  }
}

export class PrivilegeDeniedError extends TimeSyncError {
  readonly exitCode = ExitCode.CLOCK_NOT_SET;

  constructor() {
    super('Not root, not setting system time');
  }
}

export class ClockSetError extends TimeSyncError {
  readonly exitCode = ExitCode.CLOCK_NOT_SET;

  constructor(method: string, cause?: unknown) {
    super(`Failed to adjust system time with ${method}` + (cause ? ': ' + filterError(cause) : ''), cause);
  }
}

export function filterError(error: unknown): string {
  const text = error instanceof Error ? error.message : String(error);

  return text.replace(/^\s*Error:\s*/i, '').trim();
}
