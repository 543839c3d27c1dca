import { expect } from 'chai';
import { ChildProcess } from 'child_process';
import { describe, it } from 'mocha';
import { PassThrough } from 'stream';
import { monitorProcess, stripFormatting } from './process-util';

class FakeProcess extends ChildProcess {
  readonly spawnfile = 'date';
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();

  finish(out: string, err: string, code: number): void {
    if (out)
      this.stdout.write(out);

    if (err)
      this.stderr.write(err);

    setImmediate(() => this.emit('close', code, null));
  }
}

async function outcome(proc: FakeProcess): Promise<string> {
  try {
    return 'ok: ' + await monitorProcess(proc);
  }
  catch (err) {
    return 'error: ' + (err instanceof Error ? err.message : String(err));
  }
}

describe('process-util', () => {
  it('should resolve with standard output', async () => {
    const proc = new FakeProcess();
    const result = outcome(proc);

    proc.finish('Thu Jan  2 13:04:05 UTC 2025\n', '', 0);
    expect(await result).to.equal('ok: Thu Jan  2 13:04:05 UTC 2025\n');
  });

  it('should reject on a non-zero exit code', async () => {
    const proc = new FakeProcess();
    const result = outcome(proc);

    proc.finish('', 'date: cannot set date: Operation not permitted\n', 1);
    expect(await result).to.equal('error: date: cannot set date: Operation not permitted');
  });

  it('should reject on any error output', async () => {
    const proc = new FakeProcess();
    const result = outcome(proc);

    proc.finish('', 'warning text\n', 0);
    expect(await result).to.equal('error: warning text');
  });

  it('should reject on error-like standard output', async () => {
    const proc = new FakeProcess();
    const result = outcome(proc);

    proc.finish('date: invalid date\n', '', 0);
    expect(await result).to.equal('error: date: invalid date');
  });

  it('should name the exit code when there is no error text', async () => {
    const proc = new FakeProcess();
    const result = outcome(proc);

    proc.finish('', '', 2);
    expect(await result).to.equal('error: date exited with code 2');
  });

  it('should strip terminal formatting', () => {
    expect(stripFormatting('\x1B[91mERROR\x1B[39m')).to.equal('ERROR');
  });
});
