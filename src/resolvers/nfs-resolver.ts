/**
 * NfsResolver: mounts the export holding the file read-only, copies the
 * file out, and always unmounts again.
 */
import fs from 'fs';
import path from 'path';

import { SwiResolveError } from '../errors.js';
import type { IMounter } from '../interfaces/mounter.js';
import { logger } from '../logger.js';
import { withScopedMount } from '../scoped-mount.js';
import { TempPaths } from '../temp-paths.js';
import type { SpecifierOf } from '../types.js';
import { discardDownload } from './cleanup.js';
import type { TransportResolver } from './types.js';

export class NfsResolver implements TransportResolver<'nfs'> {
  readonly kind = 'nfs';

  constructor(private readonly mounter: IMounter) {}

  async resolve(spec: SpecifierOf<'nfs'>): Promise<string> {
    const exportDir = path.posix.dirname(spec.path);
    const name = path.posix.basename(spec.path);
    const source = `${spec.host.host}:${exportDir}`;

    const options = ['ro', 'nolock'];
    if (spec.host.port !== undefined) options.push(`port=${spec.host.port}`);

    const deps = { mounter: this.mounter, request: { type: 'nfs', options } };
    const target = TempPaths.downloadFile(name);
    try {
      await withScopedMount(source, deps, (mount) => {
        const remoteFile = path.join(mount.directory, name);
        if (!fs.existsSync(remoteFile)) {
          throw new SwiResolveError(
            'MissingArchive',
            `missing SWI ${spec.path} on ${source}`,
            { path: remoteFile },
          );
        }
        fs.copyFileSync(remoteFile, target);
      });
    } catch (err) {
      discardDownload(target);
      throw err;
    }

    logger.info({ source, name, target }, 'Copied SWI from nfs export');
    return target;
  }
}
