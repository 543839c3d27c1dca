import { expect } from 'chai';
import { beforeEach, describe, it } from 'mocha';
import { Logger, LogLevel } from './logger';
import { SyslogWriter } from './syslog';
import { CommandRunner } from './process-util';

const NOW = new Date(2025, 0, 2, 3, 4, 5);

describe('logger', () => {
  let lines: string[];
  let commands: string[][];
  let failure: Error | undefined;
  let run: CommandRunner;

  beforeEach(() => {
    lines = [];
    commands = [];
    failure = undefined;
    run = async (command, args) => {
      commands.push([command, ...args]);

      if (failure)
        throw failure;

      return '';
    };
  });

  function logger(verbose: boolean, syslog?: SyslogWriter): Logger {
    return new Logger({ verbose, syslog, color: false, now: () => NOW, write: line => lines.push(line) });
  }

  it('should prefix lines with local time and severity', () => {
    const log = logger(false);

    log.error('Failed to contact NTP server');
    log.warn('Not root');
    log.info('System time set');

    expect(lines).to.eql([
      '2025-01-02 03:04:05 ERROR Failed to contact NTP server',
      '2025-01-02 03:04:05 WARNING Not root',
      '2025-01-02 03:04:05 INFO System time set'
    ]);
  });

  it('should show debug lines only when verbose', () => {
    logger(false).debug('hidden');
    expect(lines).to.eql([]);

    logger(true).debug('shown');
    expect(lines).to.eql(['2025-01-02 03:04:05 DEBUG shown']);
  });

  it('should color tags when asked', () => {
    new Logger({ color: true, now: () => NOW, write: line => lines.push(line) }).error('x');

    expect(lines).to.eql(['2025-01-02 03:04:05 \x1B[91mERROR\x1B[39m x']);
  });

  it('should mirror non-debug lines to syslog', async () => {
    const log = logger(true, new SyslogWriter('timesync', run));

    log.debug('detail');
    log.info('offset_ms=9950');
    log.log(LogLevel.ERROR, 'failed');
    await log.flush();

    expect(commands).to.eql([
      ['logger', '-t', 'timesync', '-p', 'user.info', '--', 'offset_ms=9950'],
      ['logger', '-t', 'timesync', '-p', 'user.err', '--', 'failed']
    ]);
    expect(lines.length).to.equal(3);
  });

  it('should report a syslog failure once on flush', async () => {
    failure = new Error('logger: command not found');

    const log = logger(false, new SyslogWriter('timesync', run));

    log.warn('one');
    log.warn('two');
    await log.flush();

    expect(commands.length).to.equal(2);
    expect(lines).to.eql([
      '2025-01-02 03:04:05 WARNING one',
      '2025-01-02 03:04:05 WARNING two',
      '2025-01-02 03:04:05 WARNING Syslog write failed: logger: command not found'
    ]);
  });
});
