import Chalk from 'chalk';
import { filterError } from './errors';
import { LogLevel, SyslogWriter } from './syslog';
import { timeStamp } from './util';

export { LogLevel };

export interface LoggerOptions {
  verbose?: boolean;
  color?: boolean;
  syslog?: SyslogWriter;
  write?: (line: string) => void;
  now?: () => Date;
}

const TAGS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARNING]: 'WARNING',
  [LogLevel.ERROR]: 'ERROR'
};

export class Logger {
  private chalk: Chalk.Chalk;
  private now: () => Date;
  private syslog: SyslogWriter | undefined;
  private verbose: boolean;
  private write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.chalk = new Chalk.Instance({ level: (options.color ?? !!process.stderr.isTTY) ? 1 : 0 });
    this.now = options.now ?? (() => new Date());
    this.syslog = options.syslog;
    this.verbose = !!options.verbose;
    this.write = options.write ?? (line => process.stderr.write(line + '\n'));
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  warn(message: string): void {
    this.log(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  log(level: LogLevel, message: string): void {
    if (level === LogLevel.DEBUG && !this.verbose)
      return;

    this.write(`${timeStamp(this.now())} ${this.colorTag(level)} ${message}`);

    if (this.syslog && level !== LogLevel.DEBUG)
      this.syslog.write(level, message);
  }

  /**
   * Waits for outstanding syslog writes. A syslog failure is reported on the console only.
   */
  async flush(): Promise<void> {
    if (!this.syslog)
      return;

    const failure = await this.syslog.close();

    if (failure)
      this.write(`${timeStamp(this.now())} ${this.colorTag(LogLevel.WARNING)} Syslog write failed: ${filterError(failure)}`);
  }

  private colorTag(level: LogLevel): string {
    const tag = TAGS[level];

    switch (level) {
      case LogLevel.ERROR: return this.chalk.redBright(tag);
      case LogLevel.WARNING: return this.chalk.yellow(tag);
      case LogLevel.DEBUG: return this.chalk.gray(tag);
      default: return tag;
    }
  }
}
