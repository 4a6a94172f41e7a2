/**
 * LocalResolver: absolute paths. A path that does not exist yet but sits
 * under a registered mount directory is looked up on that device instead.
 */
import fs from 'fs';

import { invalidSpecifier } from '../errors.js';
import type { IMountRegistry } from '../interfaces/mount-registry.js';
import { logger } from '../logger.js';
import type { SpecifierOf } from '../types.js';
import type { BlockdevResolver } from './blockdev-resolver.js';
import type { TransportResolver } from './types.js';

export class LocalResolver implements TransportResolver<'local'> {
  readonly kind = 'local';

  constructor(
    private readonly registry: IMountRegistry,
    private readonly blockdev: BlockdevResolver,
  ) {}

  async resolve(spec: SpecifierOf<'local'>): Promise<string> {
    if (fs.existsSync(spec.path)) return spec.path;

    const match = this.registry.findByPath(spec.path);
    if (!match) {
      throw invalidSpecifier(
        spec.path,
        'path does not exist and is not under a registered mount',
      );
    }

    logger.debug(
      { path: spec.path, label: match.label },
      'Path belongs to registered mount, resolving on device',
    );
    return this.blockdev.resolve({
      kind: 'device',
      device: match.label,
      path: match.relativePath,
    });
  }
}
