/**
 * IMountRegistry: read-only view of the persisted label -> directory map.
 * Other system activity may rewrite it at any time, so implementations
 * must not cache between calls.
 */
import type { MountRecord } from '../types.js';

export interface RegistryMatch extends MountRecord {
  /** Remainder of the queried path below `directory`, without a leading '/'. */
  relativePath: string;
}

export interface IMountRegistry {
  lookup(label: string): string | null;
  entries(): MountRecord[];
  /** Reverse lookup: which registered directory contains `target`. */
  findByPath(target: string): RegistryMatch | null;
}
