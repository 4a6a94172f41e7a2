/**
 * TftpResolver: tftp://host[:port]/path via the tftp-hpa client.
 */
import path from 'path';

import { TFTP_DEFAULT_PORT } from '../config.js';
import type { ICommandRunner } from '../interfaces/command-runner.js';
import { logger } from '../logger.js';
import { TempPaths } from '../temp-paths.js';
import type { SpecifierOf } from '../types.js';
import { discardDownload } from './cleanup.js';
import type { TransportResolver } from './types.js';

export class TftpResolver implements TransportResolver<'tftp'> {
  readonly kind = 'tftp';

  constructor(private readonly runner: ICommandRunner) {}

  async resolve(spec: SpecifierOf<'tftp'>): Promise<string> {
    const target = TempPaths.downloadFile(path.posix.basename(spec.path));
    const port = spec.host.port ?? TFTP_DEFAULT_PORT;
    // TFTP paths are relative to the server root
    const remote = spec.path.replace(/^\//, '');

    try {
      this.runner.run('tftp', [
        '-m',
        'binary',
        spec.host.host,
        String(port),
        '-c',
        'get',
        remote,
        target,
      ]);
    } catch (err) {
      discardDownload(target);
      throw err;
    }

    logger.info(
      { host: spec.host.host, port, path: remote, target },
      'Fetched SWI over tftp',
    );
    return target;
  }
}
