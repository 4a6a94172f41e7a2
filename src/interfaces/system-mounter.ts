/**
 * SystemMounter: IMounter backed by the mount/umount binaries.
 */
import type { ICommandRunner } from './command-runner.js';
import type { IMounter, MountRequest } from './mounter.js';

export class SystemMounter implements IMounter {
  constructor(private readonly runner: ICommandRunner) {}

  mount(source: string, directory: string, req: MountRequest = {}): void {
    const args: string[] = [];
    if (req.type) args.push('-t', req.type);
    if (req.options && req.options.length > 0) {
      args.push('-o', req.options.join(','));
    }
    this.runner.run('mount', [...args, source, directory]);
  }

  unmount(directory: string): void {
    this.runner.run('umount', [directory]);
  }

  move(from: string, to: string): void {
    this.runner.run('mount', ['--move', from, to]);
  }
}
