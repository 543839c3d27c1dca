import { ClockSetter } from './clock-setter';
import { Config } from './config';
import { ExitCode, filterError, RetriesExhaustedError, TimeSyncError } from './errors';
import { Logger } from './logger';
import { NtpData, NtpExchange, OffsetEstimate, QueryResult } from './ntp-data';
import { NtpQuery } from './ntp';
import { parseResponse } from './ntp-packet';
import { computeOffset } from './offset';
import { Decision, decide, exitCodeFor } from './policy';
import { formatMillis } from './util';

export const RETRY_DELAY = 200;

export interface TimeSyncDeps {
  query: NtpQuery;
  clockSetter: ClockSetter;
  isPrivileged: () => boolean;
  sleep: (ms: number) => Promise<void>;
  logger: Logger;
}

export interface Measurement {
  exchange: NtpExchange;
  data: NtpData;
  result: QueryResult;
}

export interface SyncOutcome {
  exitCode: ExitCode;
  decision?: Decision;
  error?: TimeSyncError;
  measurement?: Measurement;
  estimate?: OffsetEstimate;
}

/**
 * Queries the server up to `config.retries` times. Only errors flagged as retryable (timeouts, short or invalid
 * responses) lead to another attempt; anything else is rethrown at once.
 */
export async function acquireTime(config: Config, deps: Pick<TimeSyncDeps, 'query' | 'sleep' | 'logger'>): Promise<Measurement> {
  const { logger } = deps;
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.retries; ++attempt) {
    logger.debug(`Attempt (${attempt}) at NTP query on ${config.server} ...`);

    try {
      const exchange = await deps.query(config.server, config.timeoutMs);
      const data = parseResponse(exchange.response);
      const result: QueryResult = { localSendMs: exchange.localSendMs, localRecvMs: exchange.localRecvMs, remoteMs: data.txTm };

      return { exchange, data, result };
    }
    catch (err) {
      if (!(err instanceof TimeSyncError) || !err.retryable)
        throw err;

      lastError = err;
      logger.debug(`Attempt (${attempt}) failed: ${filterError(err)}`);

      if (attempt < config.retries)
        await deps.sleep(RETRY_DELAY);
    }
  }

  throw new RetriesExhaustedError(config.server, config.retries, lastError);
}

// NTP short format, 16.16 fixed-point seconds
function fixedToMillis(value: number): string {
  return (value * 1000 / 0x10000).toFixed(3);
}

function report(logger: Logger, config: Config, m: Measurement, estimate: OffsetEstimate): void {
  const { result, data, exchange } = m;

  logger.debug(`Server: ${config.server} (${exchange.address}), stratum ${data.stratum}, version ${data.vn}` +
    (data.refId ? `, reference ${data.refId}` : ''));
  logger.debug(`Leap indicator ${data.li}, mode ${data.mode}, poll 2^${data.poll} s, precision 2^${data.precision} s`);
  logger.debug(`Root delay(ms): ${fixedToMillis(data.rootDelay)}, root dispersion(ms): ${fixedToMillis(data.rootDispersion)}`);
  logger.debug(`Transmit timestamp: ${data.txTm_s} s + ${data.txTm_f}/2^32`);
  logger.debug(`Local time: ${formatMillis(result.localRecvMs)}`);
  logger.debug(`Remote time: ${formatMillis(result.remoteMs)}`);
  logger.debug(`Local before(ms): ${result.localSendMs}`);
  logger.debug(`Local after(ms): ${result.localRecvMs}`);
  logger.debug(`Estimated roundtrip(ms): ${estimate.rttMs}`);
  logger.debug(`Estimated offset remote - local(ms): ${estimate.offsetMs}`);
}

function announce(logger: Logger, decision: Decision, clockSetter: ClockSetter): void {
  switch (decision.kind) {
    case 'skip':
      logger.debug(`Delta ${decision.offsetMs} ms < 500 ms, not setting system time`);
      break;
    case 'reject':
      logger.error(decision.error.message);
      break;
    case 'test-noop':
      logger.info(`Test mode, would set system time to ${formatMillis(decision.newTimeMs)}`);
      break;
    case 'deny':
      logger.warn(decision.error.message);
      break;
    case 'apply':
      logger.info(`System time set using ${clockSetter.method} (${formatMillis(decision.newTimeMs)})`);
      break;
  }
}

export async function syncTime(config: Config, deps: TimeSyncDeps): Promise<SyncOutcome> {
  const { logger } = deps;

  logger.debug(`Using server: ${config.server}`);
  logger.debug(`Timeout: ${config.timeoutMs} ms, Retries: ${config.retries}, Syslog: ${config.useSyslog ? 'on' : 'off'}`);

  let measurement: Measurement | undefined;
  let estimate: OffsetEstimate | undefined;

  try {
    measurement = await acquireTime(config, deps);
    estimate = computeOffset(measurement.result);
    report(logger, config, measurement, estimate);

    if (config.useSyslog)
      logger.info(`NTP server=${config.server} addr=${measurement.exchange.address} ` +
        `offset_ms=${estimate.offsetMs} rtt_ms=${estimate.rttMs}`);

    const decision = await decide(measurement.result, estimate, config, deps);

    announce(logger, decision, deps.clockSetter);

    return { exitCode: exitCodeFor(decision), decision, measurement, estimate };
  }
  catch (err) {
    if (!(err instanceof TimeSyncError))
      throw err;

    logger.error(err.message);

    return { exitCode: err.exitCode, error: err, measurement, estimate };
  }
}
