import { ChildProcess, spawn } from 'child_process';

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export function stripFormatting(s: string): string {
  return s.replace(/\x1B\[[\d;]*[A-Za-z]/g, '');
}

function errorish(s: string): boolean {
  s = stripFormatting(s);

  return /\b(failed|exception|invalid|operation not permitted|not permitted|cannot|illegal|usage)\b/i.test(s);
}

/**
 * Resolves with the standard output of a process. A non-zero exit code, any standard error text, or error-like
 * standard output rejects instead.
 */
export function monitorProcess(proc: ChildProcess): Promise<string> {
  let errors = '';
  let output = '';

  return new Promise<string>((resolve, reject) => {
    proc.stderr?.on('data', data => {
      errors += stripFormatting(data.toString());
    });
    proc.stdout?.on('data', data => {
      data = data.toString();
      output += data;

      if (errorish(data))
        errors = errors ? errors + '\n' + data : data;
    });
    proc.on('error', err => reject(err));
    proc.on('close', code => {
      if (code)
        reject(new Error(errors.trim() || `${proc.spawnfile} exited with code ${code}`));
      else if (errors)
        reject(new Error(errors.trim()));
      else
        resolve(output);
    });
  });
}

export const runCommand: CommandRunner = (command, args) =>
  monitorProcess(spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] }));

export function sleep(delay: number): Promise<void> {
  return new Promise<void>(resolve => setTimeout(resolve, delay));
}
