/**
 * IPartitionLocator: label -> device node via the block-id index.
 */
import type { Partition } from '../types.js';

export interface IPartitionLocator {
  /** null when the index does not know the label; that is not an error. */
  locate(label: string): Partition | null;
}
