import { CommandRunner, runCommand } from './process-util';

export enum LogLevel { DEBUG, INFO, WARNING, ERROR }

const PRIORITIES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARNING]: 'warning',
  [LogLevel.ERROR]: 'err'
};

/**
 * Mirrors log lines to the system log through the `logger` command. Writes run in the background and are
 * collected by `close()`, which reports the first failure, if any.
 */
export class SyslogWriter {
  private failure: unknown;
  private pending: Promise<void>[] = [];

  constructor(
    private readonly tag = 'timesync',
    private readonly run: CommandRunner = runCommand
  ) {}

  write(level: LogLevel, message: string): void {
    const args = ['-t', this.tag, '-p', 'user.' + PRIORITIES[level], '--', message];

    this.pending.push(this.run('logger', args).then(() => undefined, err => {
      this.failure = this.failure ?? err;
    }));
  }

  async close(): Promise<unknown> {
    await Promise.all(this.pending);
    this.pending = [];

    const failure = this.failure;

    this.failure = undefined;

    return failure;
  }
}
