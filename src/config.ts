import { toBoolean, toInt } from '@tubular/util';
import { DEFAULT_NTP_SERVER } from './ntp';
import { UsageError } from './errors';
import { clamp } from './util';

export const DEFAULT_TIMEOUT = 2000;
export const DEFAULT_RETRIES = 3;

const TIMEOUT_RANGE: [number, number] = [1, 6000];
const RETRIES_RANGE: [number, number] = [1, 10];

export interface Config {
  readonly server: string;
  readonly timeoutMs: number;
  readonly retries: number;
  readonly verbose: boolean;
  readonly testOnly: boolean;
  readonly useSyslog: boolean;
}

export type ParsedArgs = { help: true } | { help: false; config: Config };

export const USAGE =
  'Usage: timesync [-t timeout_ms] [-r retries] [-n] [-v] [-s] [-h] [ntp-server]\n' +
  '  ntp-server   NTP server to query, optionally as host:port (default: pool.ntp.org)\n' +
  '  -t timeout   Timeout in ms, 1-6000 (default: 2000)\n' +
  '  -r retries   Number of attempts, 1-10 (default: 3)\n' +
  '  -n           Test mode (no system time adjustment)\n' +
  '  -v           Verbose output\n' +
  '  -s           Enable syslog logging\n' +
  '  -h           Show this help message\n\n' +
  'Defaults can also be set with TIMESYNC_SERVER, TIMESYNC_TIMEOUT, TIMESYNC_RETRIES and TIMESYNC_SYSLOG.\n';

function numericOption(flag: string, value: string | undefined, range: [number, number]): number {
  if (value == null || !/^\s*-?\d+\s*$/.test(value))
    throw new UsageError(`Option -${flag} requires a numeric value` + (value == null ? '' : `, got "${value}"`));

  return clamp(toInt(value), range[0], range[1]);
}

export function defaultConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    server: env.TIMESYNC_SERVER?.trim() || DEFAULT_NTP_SERVER,
    timeoutMs: clamp(toInt(env.TIMESYNC_TIMEOUT, DEFAULT_TIMEOUT), ...TIMEOUT_RANGE),
    retries: clamp(toInt(env.TIMESYNC_RETRIES, DEFAULT_RETRIES), ...RETRIES_RANGE),
    verbose: false,
    testOnly: false,
    useSyslog: toBoolean(env.TIMESYNC_SYSLOG, false)
  };
}

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
  let { server, timeoutMs, retries, verbose, testOnly, useSyslog } = defaultConfig(env);

  for (let i = 0; i < argv.length; ++i) {
    const arg = argv[i];

    if (arg === '--')
      continue;
    else if (arg === '--help')
      return { help: true };
    else if (arg.startsWith('--'))
      throw new UsageError(`Unrecognized option "${arg}"`);
    else if (!arg.startsWith('-')) {
      server = arg;
      continue;
    }

    // Short flags, possibly combined (-nv), with -t and -r taking the rest of the argument or the next one.
    for (let j = 1; j < arg.length; ++j) {
      const flag = arg.charAt(j);

      switch (flag) {
        case 'h':
          return { help: true };
        case 'n':
          testOnly = true;
          break;
        case 'v':
          verbose = true;
          break;
        case 's':
          useSyslog = true;
          break;
        case 't':
        case 'r': {
          const attached = arg.substring(j + 1);
          const value = attached || argv[++i];
          const n = numericOption(flag, value, flag === 't' ? TIMEOUT_RANGE : RETRIES_RANGE);

          if (flag === 't')
            timeoutMs = n;
          else
            retries = n;

          j = arg.length;
          break;
        }
        default:
          throw new UsageError(`Unrecognized option "-${flag}"`);
      }
    }
  }

  // Syslog is never used in test mode
  if (testOnly)
    useSyslog = false;

  return { help: false, config: Object.freeze({ server, timeoutMs, retries, verbose, testOnly, useSyslog }) };
}
