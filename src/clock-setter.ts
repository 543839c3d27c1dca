import { padLeft } from '@tubular/util';
import { ClockSetError } from './errors';
import { CommandRunner, runCommand } from './process-util';

export interface ClockSetter {
  readonly method: string;
  set(newTimeMs: number): Promise<void>;
}

function pad2(n: number): string {
  return padLeft(n, 2, '0');
}

abstract class DateCommandClockSetter implements ClockSetter {
  readonly method = 'date';

  constructor(private run: CommandRunner = runCommand) {}

  protected abstract dateArgs(newTimeMs: number): string[];

  async set(newTimeMs: number): Promise<void> {
    try {
      await this.run('date', this.dateArgs(newTimeMs));
    }
    catch (err) {
      throw new ClockSetError(this.method, err);
    }
  }
}

/**
 * GNU coreutils and BusyBox: `date -u -s @seconds.millis`
 */
export class GnuDateClockSetter extends DateCommandClockSetter {
  protected dateArgs(newTimeMs: number): string[] {
    return ['-u', '-s', '@' + (newTimeMs / 1000).toFixed(3)];
  }
}

/**
 * FreeBSD, OpenBSD and NetBSD: `date -u YYYYMMDDhhmm.ss`. Whole seconds only.
 */
export class BsdDateClockSetter extends DateCommandClockSetter {
  protected dateArgs(newTimeMs: number): string[] {
    const d = new Date(newTimeMs);

    return ['-u', d.getUTCFullYear() + pad2(d.getUTCMonth() + 1) + pad2(d.getUTCDate()) +
      pad2(d.getUTCHours()) + pad2(d.getUTCMinutes()) + '.' + pad2(d.getUTCSeconds())];
  }
}

/**
 * macOS: `date -u MMDDhhmmYYYY.ss`. Whole seconds only.
 */
export class MacDateClockSetter extends DateCommandClockSetter {
  protected dateArgs(newTimeMs: number): string[] {
    const d = new Date(newTimeMs);

    return ['-u', pad2(d.getUTCMonth() + 1) + pad2(d.getUTCDate()) + pad2(d.getUTCHours()) +
      pad2(d.getUTCMinutes()) + d.getUTCFullYear() + '.' + pad2(d.getUTCSeconds())];
  }
}

export class UnsupportedClockSetter implements ClockSetter {
  constructor(readonly method: string) {}

  async set(): Promise<void> {
    throw new ClockSetError(this.method, 'setting the clock is not supported on this platform');
  }
}

export function createClockSetter(platform: NodeJS.Platform = process.platform,
                                  run: CommandRunner = runCommand): ClockSetter {
  switch (platform) {
    case 'linux':
    case 'android':
    case 'cygwin':
      return new GnuDateClockSetter(run);
    case 'freebsd':
    case 'openbsd':
    case 'netbsd':
      return new BsdDateClockSetter(run);
    case 'darwin':
      return new MacDateClockSetter(run);
    default:
      return new UnsupportedClockSetter(platform);
  }
}

export function isPrivileged(): boolean {
  return process.geteuid?.() === 0;
}
