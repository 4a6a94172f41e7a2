/**
 * ProcessCommandRunner: spawnSync implementation of ICommandRunner.
 */
import { spawnSync, type SpawnSyncReturns } from 'child_process';
import fs from 'fs';

import { SwiResolveError } from '../errors.js';
import { logger } from '../logger.js';
import { redactSpecifier } from '../specifier.js';
import type {
  CommandOptions,
  CommandResult,
  ICommandRunner,
} from './command-runner.js';

export class ProcessCommandRunner implements ICommandRunner {
  run(bin: string, args: string[], opts: CommandOptions = {}): CommandResult {
    const command = [bin, ...args.map(redactSpecifier)].join(' ');
    logger.debug({ command, stdoutFile: opts.stdoutFile }, 'Running command');

    const fd = opts.stdoutFile ? fs.openSync(opts.stdoutFile, 'w') : null;
    let result: SpawnSyncReturns<string>;
    try {
      result = spawnSync(bin, args, {
        env: opts.env ? { ...process.env, ...opts.env } : process.env,
        stdio: [
          'ignore',
          fd ?? 'pipe',
          opts.inheritStderr ? 'inherit' : 'pipe',
        ],
        encoding: 'utf-8',
      });
    } finally {
      if (fd !== null) fs.closeSync(fd);
    }

    if (result.error) {
      throw new SwiResolveError(
        'TransportFailure',
        `failed to run ${bin}: ${result.error.message}`,
        { command },
      );
    }

    const outcome: CommandResult = {
      status: result.status ?? -1,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
    };

    if (outcome.status !== 0 && !opts.allowNonZeroExit) {
      throw new SwiResolveError(
        'TransportFailure',
        `${bin} exited with ${result.signal ?? `status ${outcome.status}`}`,
        { command, status: outcome.status, stderr: outcome.stderr.trim() },
      );
    }
    return outcome;
  }
}
