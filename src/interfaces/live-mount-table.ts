/**
 * ILiveMountTable: what the kernel currently has mounted.
 */
import type { LiveMount } from '../types.js';

export interface ILiveMountTable {
  /** Every place `device` is mounted right now, in table order. */
  mountsOf(device: string): LiveMount[];

  /** The most recent mount on `directory`, if any. */
  mountAt(directory: string): LiveMount | null;
}
