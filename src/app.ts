#!/usr/bin/env node
/*
  Copyright © 2018-2022 Kerry Shetline, kerry@shetline.com

  MIT license: https://opensource.org/licenses/MIT

  Permission is hereby granted, free of charge, to any person obtaining a copy of this software and associated
  documentation files (the "Software"), to deal in the Software without restriction, including without limitation the
  rights to use, copy, modify, merge, publish, distribute, sublicense, and/or sell copies of the Software, and to permit
  persons to whom the Software is furnished to do so, subject to the following conditions:

  The above copyright notice and this permission notice shall be included in all copies or substantial portions of the
  Software.

  THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR IMPLIED, INCLUDING BUT NOT LIMITED TO THE
  WARRANTIES OF MERCHANTABILITY, FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE AUTHORS OR
  COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR
  OTHERWISE, ARISING FROM, OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE SOFTWARE.
*/

import { createClockSetter, isPrivileged } from './clock-setter';
import { ParsedArgs, parseArgs, USAGE } from './config';
import { filterError, TimeSyncError } from './errors';
import { Logger } from './logger';
import { queryNtp } from './ntp';
import { sleep } from './process-util';
import { SyslogWriter } from './syslog';
import { syncTime } from './time-sync';

async function main(argv: string[]): Promise<number> {
  let args: ParsedArgs;

  try {
    args = parseArgs(argv);
  }
  catch (err) {
    if (err instanceof TimeSyncError) {
      new Logger().error(err.message);
      process.stderr.write(USAGE);

      return err.exitCode;
    }

    throw err;
  }

  if (args.help) {
    process.stderr.write(USAGE);

    return 0;
  }

  const { config } = args;
  const logger = new Logger({ verbose: config.verbose, syslog: config.useSyslog ? new SyslogWriter() : undefined });

  try {
    const outcome = await syncTime(config, {
      query: queryNtp,
      clockSetter: createClockSetter(),
      isPrivileged,
      sleep,
      logger
    });

    return outcome.exitCode;
  }
  finally {
    await logger.flush();
  }
}

main(process.argv.slice(2)).then(code => {
  process.exitCode = code;
}, err => {
  new Logger().error('Unexpected error: ' + filterError(err));
  process.exitCode = 1;
});
