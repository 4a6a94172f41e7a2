/**
 * IMounter: mount(8)/umount(8) operations. These are the only writes
 * this tool makes to the kernel mount table.
 */

export interface MountRequest {
  /** Filesystem type, e.g. 'nfs'. Omitted lets mount probe. */
  type?: string;
  /** Joined into a single -o argument. */
  options?: string[];
}

export interface IMounter {
  mount(source: string, directory: string, req?: MountRequest): void;
  unmount(directory: string): void;
  /** Atomically relocate an existing mount (mount --move). */
  move(from: string, to: string): void;
}
