/**
 * BlockdevResolver: `/dev/node:path` and `LABEL:path`.
 *
 * Reuses an existing mount of the device when there is one. Otherwise the
 * device is mounted on a temporary directory and left mounted for the
 * caller: moved onto its registered directory when it has one, or kept
 * where it is.
 */
import fs from 'fs';
import path from 'path';

import { LATEST_TOKEN, SWI_SUFFIX } from '../config.js';
import { SwiResolveError } from '../errors.js';
import type { ILiveMountTable } from '../interfaces/live-mount-table.js';
import type { IMounter } from '../interfaces/mounter.js';
import type { IMountRegistry } from '../interfaces/mount-registry.js';
import type { IPartitionLocator } from '../interfaces/partition-locator.js';
import { selectLatestArchive } from '../latest-archive.js';
import { logger } from '../logger.js';
import { withScopedMount } from '../scoped-mount.js';
import type { SpecifierOf } from '../types.js';
import { removeMountPoint } from './cleanup.js';
import type { TransportResolver } from './types.js';

export interface BlockdevResolverDeps {
  mounter: IMounter;
  liveMounts: ILiveMountTable;
  registry: IMountRegistry;
  partitions: IPartitionLocator;
}

export class BlockdevResolver implements TransportResolver<'device'> {
  readonly kind = 'device';

  constructor(private readonly deps: BlockdevResolverDeps) {}

  async resolve(spec: SpecifierOf<'device'>): Promise<string> {
    if (spec.device.startsWith('/dev/')) {
      return this.copy(spec.device, spec.path);
    }

    const label = spec.device;
    const destDir = this.deps.registry.lookup(label) ?? undefined;
    const partition = this.deps.partitions.locate(label);
    if (partition) {
      return this.copy(partition.device, spec.path, destDir);
    }

    // Registry labels need not be filesystem labels; accept one whose
    // directory is already a live mount
    const live = destDir ? this.deps.liveMounts.mountAt(destDir) : null;
    if (live) {
      return this.copy(live.device, spec.path, destDir);
    }

    throw new SwiResolveError(
      'NotFound',
      `unknown device or label '${label}'`,
      { label },
    );
  }

  /**
   * Locate `requested` (a relative path or the :latest token) on `device`.
   * `destDir` is where the device belongs if it has to be mounted here.
   */
  async copy(
    device: string,
    requested: string,
    destDir?: string,
  ): Promise<string> {
    const live = this.deps.liveMounts.mountsOf(device)[0];
    if (live) {
      logger.debug(
        { device, directory: live.directory },
        'Device already mounted',
      );
      return this.locate(live.directory, requested);
    }

    return withScopedMount(device, { mounter: this.deps.mounter }, (mount) => {
      const found = this.locate(mount.directory, requested);

      if (
        destDir &&
        path.resolve(destDir) !== path.resolve(mount.directory)
      ) {
        fs.mkdirSync(destDir, { recursive: true });
        this.deps.mounter.move(mount.directory, destDir);
        mount.disown();
        removeMountPoint(mount.directory);
        logger.info(
          { device, directory: destDir },
          'Moved mount to its registered directory',
        );
        return path.join(destDir, path.relative(mount.directory, found));
      }

      // Left mounted for whoever installs from it
      mount.disown();
      return found;
    });
  }

  private locate(directory: string, requested: string): string {
    let candidate: string;
    if (requested === LATEST_TOKEN) {
      const latest = selectLatestArchive(directory);
      if (!latest) {
        throw new SwiResolveError(
          'MissingArchive',
          `missing SWI: no *${SWI_SUFFIX} in ${directory}`,
          { directory },
        );
      }
      candidate = latest;
    } else {
      candidate = path.join(directory, requested);
    }

    if (!fs.existsSync(candidate)) {
      throw new SwiResolveError(
        'MissingArchive',
        `missing SWI ${candidate}`,
        { path: candidate },
      );
    }
    return candidate;
  }
}
