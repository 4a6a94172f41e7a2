// Interfaces
export type {
  CommandOptions,
  CommandResult,
  ICommandRunner,
} from './command-runner.js';
export type { ILiveMountTable } from './live-mount-table.js';
export type { IMounter, MountRequest } from './mounter.js';
export type { IMountRegistry, RegistryMatch } from './mount-registry.js';
export type { IPartitionLocator } from './partition-locator.js';

// Implementations
export { BlkidPartitionLocator } from './blkid-partition-locator.js';
export { ProcessCommandRunner } from './process-command-runner.js';
export { ProcMountTable } from './proc-mount-table.js';
export { SystemMounter } from './system-mounter.js';
export { YamlMountRegistry } from './yaml-mount-registry.js';
