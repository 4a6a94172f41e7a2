import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import fs from 'fs';
import path from 'path';

import { makeTempDir } from '../test-fakes.js';
import { ProcMountTable } from './proc-mount-table.js';

const MOUNTS = [
  '/dev/swi-test-a /mnt/onl/boot ext4 rw,relatime 0 0',
  '/dev/swi-test-b /mnt/with\\040space ext4 rw 0 0',
  '/dev/swi-test-a /mnt/second ext4 ro 0 0',
  'tmpfs /tmp tmpfs rw 0 0',
  '',
].join('\n');

describe('ProcMountTable', () => {
  let dir: string;
  let table: ProcMountTable;

  beforeEach(() => {
    dir = makeTempDir('swi-mounts-');
    const file = path.join(dir, 'mounts');
    fs.writeFileSync(file, MOUNTS);
    table = new ProcMountTable(file);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lists every mount', () => {
    expect(table.list()).toHaveLength(4);
  });

  it('finds all mounts of a device in table order', () => {
    expect(table.mountsOf('/dev/swi-test-a')).toEqual([
      { device: '/dev/swi-test-a', directory: '/mnt/onl/boot' },
      { device: '/dev/swi-test-a', directory: '/mnt/second' },
    ]);
  });

  it('decodes octal escapes in paths', () => {
    expect(table.mountsOf('/dev/swi-test-b')).toEqual([
      { device: '/dev/swi-test-b', directory: '/mnt/with space' },
    ]);
  });

  it('returns nothing for an unmounted device', () => {
    expect(table.mountsOf('/dev/swi-test-z')).toEqual([]);
  });

  it('finds the mount on a directory', () => {
    expect(table.mountAt('/mnt/onl/boot')).toEqual({
      device: '/dev/swi-test-a',
      directory: '/mnt/onl/boot',
    });
    expect(table.mountAt('/mnt/nowhere')).toBeNull();
  });
});
