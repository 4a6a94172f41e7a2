import fs from 'fs';

import type { IMounter, MountRequest } from './interfaces/mounter.js';
import { logger } from './logger.js';
import { TempPaths } from './temp-paths.js';

export interface ScopedMountDeps {
  mounter: IMounter;
  request?: MountRequest;
}

/**
 * A device mounted on a fresh temporary directory.
 *
 * While owned, release() unmounts and then removes the directory, once.
 * disown() hands the mount to someone else (e.g. after mount --move) and
 * turns release() into a no-op.
 */
export class ScopedMount {
  private owned = true;

  private constructor(
    readonly device: string,
    readonly directory: string,
    private readonly mounter: IMounter,
  ) {}

  static acquire(device: string, deps: ScopedMountDeps): ScopedMount {
    const directory = TempPaths.mountPoint();
    try {
      deps.mounter.mount(device, directory, deps.request);
    } catch (err) {
      fs.rmdirSync(directory);
      throw err;
    }
    logger.debug({ device, directory }, 'Temporary mount acquired');
    return new ScopedMount(device, directory, deps.mounter);
  }

  get ownsMount(): boolean {
    return this.owned;
  }

  disown(): void {
    this.owned = false;
  }

  release(): void {
    if (!this.owned) return;
    this.owned = false;
    // Must leave the mount table before the directory goes, or rmdir
    // would be operating on the mounted filesystem
    this.mounter.unmount(this.directory);
    fs.rmdirSync(this.directory);
    logger.debug(
      { device: this.device, directory: this.directory },
      'Temporary mount released',
    );
  }
}

/**
 * Run `body` against a temporary mount of `device`, releasing it however
 * `body` exits. A release failure while `body` is already failing is
 * logged and the body's error is the one thrown.
 */
export async function withScopedMount<T>(
  device: string,
  deps: ScopedMountDeps,
  body: (mount: ScopedMount) => Promise<T> | T,
): Promise<T> {
  const mount = ScopedMount.acquire(device, deps);
  let result: T;
  try {
    result = await body(mount);
  } catch (err) {
    try {
      mount.release();
    } catch (releaseErr) {
      logger.warn(
        { device, directory: mount.directory, err: releaseErr },
        'Cleanup of temporary mount failed',
      );
    }
    throw err;
  }
  mount.release();
  return result;
}
