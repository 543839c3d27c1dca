import { expect } from 'chai';
import { describe, it } from 'mocha';
import { Config, parseArgs } from './config';
import { UsageError } from './errors';

function configFor(args: string[], env: NodeJS.ProcessEnv = {}): Config {
  const parsed = parseArgs(args, env);

  if (parsed.help)
    throw new Error('unexpected help request');

  return parsed.config;
}

describe('config', () => {
  it('should use defaults', () => {
    expect(configFor([])).to.eql({
      server: 'pool.ntp.org',
      timeoutMs: 2000,
      retries: 3,
      verbose: false,
      testOnly: false,
      useSyslog: false
    });
  });

  it('should parse options and server', () => {
    expect(configFor(['-t', '1500', '-r', '2', '-s', '-v', 'time.example.com'])).to.eql({
      server: 'time.example.com',
      timeoutMs: 1500,
      retries: 2,
      verbose: true,
      testOnly: false,
      useSyslog: true
    });
  });

  it('should accept attached and combined flags', () => {
    const config = configFor(['-vst750', '-r5']);

    expect(config.verbose).to.be.true;
    expect(config.useSyslog).to.be.true;
    expect(config.timeoutMs).to.equal(750);
    expect(config.retries).to.equal(5);
  });

  it('should clamp timeout and retries', () => {
    expect(configFor(['-t', '0', '-r', '0'])).to.include({ timeoutMs: 1, retries: 1 });
    expect(configFor(['-t', '60000', '-r', '99'])).to.include({ timeoutMs: 6000, retries: 10 });
    expect(configFor(['-t', '-5'])).to.include({ timeoutMs: 1 });
  });

  it('should turn syslog off in test mode', () => {
    expect(configFor(['-sn'])).to.include({ testOnly: true, useSyslog: false });
    expect(configFor(['-n'], { TIMESYNC_SYSLOG: 'true' })).to.include({ testOnly: true, useSyslog: false });
  });

  it('should take defaults from the environment, overridden by flags', () => {
    const env = { TIMESYNC_SERVER: 'ntp.example.org', TIMESYNC_TIMEOUT: '9000', TIMESYNC_RETRIES: '4', TIMESYNC_SYSLOG: 'true' };

    expect(configFor([], env)).to.include({ server: 'ntp.example.org', timeoutMs: 6000, retries: 4, useSyslog: true });
    expect(configFor(['-t', '100', 'time.example.com'], env)).to.include({ server: 'time.example.com', timeoutMs: 100 });
  });

  it('should recognize help', () => {
    expect(parseArgs(['-h'], {})).to.eql({ help: true });
    expect(parseArgs(['-vh'], {})).to.eql({ help: true });
    expect(parseArgs(['--help'], {})).to.eql({ help: true });
  });

  it('should reject unknown options and missing values', () => {
    expect(() => parseArgs(['-x'], {})).to.throw(UsageError, 'Unrecognized option "-x"');
    expect(() => parseArgs(['--verbose'], {})).to.throw(UsageError, 'Unrecognized option "--verbose"');
    expect(() => parseArgs(['-t'], {})).to.throw(UsageError, 'Option -t requires a numeric value');
    expect(() => parseArgs(['-r', 'many'], {})).to.throw(UsageError, 'Option -r requires a numeric value, got "many"');
  });

  it('should produce a frozen configuration', () => {
    expect(Object.isFrozen(configFor(['-v']))).to.be.true;
  });
});
