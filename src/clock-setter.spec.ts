import { expect } from 'chai';
import { beforeEach, describe, it } from 'mocha';
import {
  BsdDateClockSetter, createClockSetter, GnuDateClockSetter, MacDateClockSetter, UnsupportedClockSetter
} from './clock-setter';
import { ClockSetError } from './errors';
import { CommandRunner } from './process-util';

const NEW_TIME = Date.UTC(2025, 0, 2, 13, 4, 5, 250); // 1735823045250

describe('clock-setter', () => {
  let commands: string[][];
  let failure: Error | undefined;
  let run: CommandRunner;

  beforeEach(() => {
    commands = [];
    failure = undefined;
    run = async (command, args) => {
      commands.push([command, ...args]);

      if (failure)
        throw failure;

      return '';
    };
  });

  it('should pick an implementation by platform', () => {
    expect(createClockSetter('linux', run)).to.be.instanceOf(GnuDateClockSetter);
    expect(createClockSetter('freebsd', run)).to.be.instanceOf(BsdDateClockSetter);
    expect(createClockSetter('openbsd', run)).to.be.instanceOf(BsdDateClockSetter);
    expect(createClockSetter('darwin', run)).to.be.instanceOf(MacDateClockSetter);
    expect(createClockSetter('win32', run)).to.be.instanceOf(UnsupportedClockSetter);
  });

  it('should set time with GNU date', async () => {
    await createClockSetter('linux', run).set(NEW_TIME);
    expect(commands).to.eql([['date', '-u', '-s', '@1735823045.250']]);
  });

  it('should set time with BSD date', async () => {
    await createClockSetter('freebsd', run).set(NEW_TIME);
    expect(commands).to.eql([['date', '-u', '202501021304.05']]);
  });

  it('should set time with macOS date', async () => {
    await createClockSetter('darwin', run).set(NEW_TIME);
    expect(commands).to.eql([['date', '-u', '010213042025.05']]);
  });

  it('should report a failed command', async () => {
    failure = new Error('date: cannot set date: Operation not permitted');

    let err: unknown;

    try {
      await createClockSetter('linux', run).set(NEW_TIME);
    }
    catch (e) {
      err = e;
    }

    expect(err).to.be.instanceOf(ClockSetError);
    expect((err as ClockSetError).message).to.equal('Failed to adjust system time with date: date: cannot set date: Operation not permitted');
    expect((err as ClockSetError).cause).to.equal(failure);
  });

  it('should refuse on unsupported platforms', async () => {
    let err: unknown;

    try {
      await createClockSetter('win32', run).set(NEW_TIME);
    }
    catch (e) {
      err = e;
    }

    expect(err).to.be.instanceOf(ClockSetError);
    expect(commands).to.eql([]);
  });
});
