/**
 * In-process stand-ins for the system collaborators, shared by the tests.
 */
import AdmZip from 'adm-zip';
import fs from 'fs';
import yaml from 'js-yaml';
import os from 'os';
import path from 'path';

import type {
  CommandOptions,
  CommandResult,
  ICommandRunner,
} from './interfaces/command-runner.js';
import type { ILiveMountTable } from './interfaces/live-mount-table.js';
import type { IMounter, MountRequest } from './interfaces/mounter.js';
import type { IPartitionLocator } from './interfaces/partition-locator.js';
import { YamlMountRegistry } from './interfaces/yaml-mount-registry.js';
import type { LiveMount, MountRecord, Partition } from './types.js';

export function makeTempDir(prefix = 'swi-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function clearDir(dir: string): void {
  for (const entry of fs.readdirSync(dir)) {
    fs.rmSync(path.join(dir, entry), { recursive: true, force: true });
  }
}

export interface SwiContents {
  manifest?: unknown;
  version?: string;
  extra?: Record<string, string>;
}

/** Write a zip-format SWI with the given metadata entries. */
export function writeSwi(file: string, contents: SwiContents = {}): string {
  const zip = new AdmZip();
  if (contents.manifest !== undefined) {
    const raw =
      typeof contents.manifest === 'string'
        ? contents.manifest
        : JSON.stringify(contents.manifest);
    zip.addFile('manifest.json', Buffer.from(raw));
  }
  if (contents.version !== undefined) {
    zip.addFile('version', Buffer.from(contents.version));
  }
  const extra = contents.extra ?? { 'rootfs.sqsh': 'rootfs' };
  for (const [name, body] of Object.entries(extra)) {
    zip.addFile(name, Buffer.from(body));
  }
  fs.mkdirSync(path.dirname(file), { recursive: true });
  zip.writeZip(file);
  return file;
}

export interface RecordedCommand {
  bin: string;
  args: string[];
  opts: CommandOptions;
}

export type CommandHandler = (
  cmd: RecordedCommand,
) => CommandResult | undefined;

export class FakeCommandRunner implements ICommandRunner {
  readonly calls: RecordedCommand[] = [];

  constructor(private readonly handler: CommandHandler = () => undefined) {}

  run(bin: string, args: string[], opts: CommandOptions = {}): CommandResult {
    const cmd = { bin, args, opts };
    this.calls.push(cmd);
    return this.handler(cmd) ?? { status: 0, stdout: '', stderr: '' };
  }
}

export type MounterCall =
  | { op: 'mount'; source: string; directory: string; req?: MountRequest }
  | { op: 'unmount'; directory: string }
  | { op: 'move'; from: string; to: string };

/**
 * Keeps its own mount table. `populate` plays the part of the mounted
 * filesystem by writing files into the directory; unmount empties it again.
 */
export type Populate = (source: string, directory: string) => void;

export class FakeMounter implements IMounter {
  readonly calls: MounterCall[] = [];
  readonly mounted = new Map<string, string>();
  failMount: Error | null = null;
  failUnmount: Error | null = null;

  constructor(
    private readonly populate: Populate = () => {},
  ) {}

  mount(source: string, directory: string, req?: MountRequest): void {
    this.calls.push({ op: 'mount', source, directory, req });
    if (this.failMount) throw this.failMount;
    this.mounted.set(directory, source);
    this.populate(source, directory);
  }

  unmount(directory: string): void {
    this.calls.push({ op: 'unmount', directory });
    if (this.failUnmount) throw this.failUnmount;
    this.mounted.delete(directory);
    clearDir(directory);
  }

  move(from: string, to: string): void {
    this.calls.push({ op: 'move', from, to });
    const source = this.mounted.get(from);
    this.mounted.delete(from);
    if (source !== undefined) this.mounted.set(to, source);
    clearDir(from);
  }
}

export class FakeLiveMounts implements ILiveMountTable {
  constructor(readonly mounts: LiveMount[] = []) {}

  mountsOf(device: string): LiveMount[] {
    return this.mounts.filter((m) => m.device === device);
  }

  mountAt(directory: string): LiveMount | null {
    return this.mounts.filter((m) => m.directory === directory).at(-1) ?? null;
  }
}

export class FakePartitions implements IPartitionLocator {
  readonly queried: string[] = [];

  constructor(private readonly devices: Record<string, string> = {}) {}

  locate(label: string): Partition | null {
    this.queried.push(label);
    const device = this.devices[label];
    return device ? { label, device } : null;
  }
}

/** A real YAML-backed registry in a temp file. */
export function registryWith(records: MountRecord[]): YamlMountRegistry {
  const mounts: Record<string, { dir: string }> = {};
  for (const r of records) mounts[r.label] = { dir: r.directory };
  const file = path.join(makeTempDir('swi-registry-'), 'mtab.yml');
  fs.writeFileSync(file, yaml.dump({ mounts }));
  return new YamlMountRegistry(file);
}
