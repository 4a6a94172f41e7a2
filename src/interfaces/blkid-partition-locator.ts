/**
 * BlkidPartitionLocator: IPartitionLocator backed by `blkid -L`.
 */
import { logger } from '../logger.js';
import type { Partition } from '../types.js';
import type { ICommandRunner } from './command-runner.js';
import type { IPartitionLocator } from './partition-locator.js';

export class BlkidPartitionLocator implements IPartitionLocator {
  constructor(private readonly runner: ICommandRunner) {}

  locate(label: string): Partition | null {
    const result = this.runner.run('blkid', ['-L', label], {
      allowNonZeroExit: true,
    });
    const device = result.stdout.trim().split('\n')[0];
    if (result.status !== 0 || !device) {
      logger.debug(
        { label, status: result.status },
        'Label not in block-id index',
      );
      return null;
    }
    return { label, device };
  }
}
