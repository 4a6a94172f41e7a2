/**
 * SshResolver: scp:// and ssh://, fetched by running `cat` on the remote side.
 * A password travels to sshpass through the environment, never argv.
 */
import path from 'path';

import { SSH_PASSWORD_ENV } from '../config.js';
import type { ICommandRunner } from '../interfaces/command-runner.js';
import { logger } from '../logger.js';
import { TempPaths } from '../temp-paths.js';
import type { HostInfo, SpecifierOf } from '../types.js';
import { discardDownload } from './cleanup.js';
import type { TransportResolver } from './types.js';

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function destination(host: HostInfo): string {
  return host.user ? `${host.user}@${host.host}` : host.host;
}

export class SshResolver implements TransportResolver<'ssh'> {
  readonly kind = 'ssh';

  constructor(private readonly runner: ICommandRunner) {}

  async resolve(spec: SpecifierOf<'ssh'>): Promise<string> {
    const target = TempPaths.downloadFile(path.posix.basename(spec.path));
    const sshArgs = [
      '-o',
      'StrictHostKeyChecking=no',
      '-o',
      'UserKnownHostsFile=/dev/null',
    ];
    if (spec.host.port !== undefined) {
      sshArgs.push('-p', String(spec.host.port));
    }
    const remote = `cat ${shellQuote(spec.path)}`;

    try {
      if (spec.host.password !== undefined) {
        this.runner.run(
          'sshpass',
          ['-e', 'ssh', ...sshArgs, destination(spec.host), remote],
          {
            env: { [SSH_PASSWORD_ENV]: spec.host.password },
            stdoutFile: target,
          },
        );
      } else {
        this.runner.run(
          'ssh',
          [...sshArgs, '-o', 'BatchMode=yes', destination(spec.host), remote],
          { stdoutFile: target },
        );
      }
    } catch (err) {
      discardDownload(target);
      throw err;
    }

    logger.info(
      { host: spec.host.host, path: spec.path, target },
      'Copied SWI over ssh',
    );
    return target;
  }
}
