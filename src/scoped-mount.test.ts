import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('./logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import fs from 'fs';

import { logger } from './logger.js';
import { ScopedMount, withScopedMount } from './scoped-mount.js';
import { FakeMounter } from './test-fakes.js';

describe('ScopedMount', () => {
  let mounter: FakeMounter;

  beforeEach(() => {
    vi.clearAllMocks();
    mounter = new FakeMounter();
  });

  it('mounts the device on a fresh directory', () => {
    const mount = ScopedMount.acquire('/dev/sdb1', { mounter });

    expect(fs.statSync(mount.directory).isDirectory()).toBe(true);
    expect(mounter.mounted.get(mount.directory)).toBe('/dev/sdb1');
    expect(mount.ownsMount).toBe(true);
    mount.release();
  });

  it('unmounts before removing the directory', () => {
    const seen: boolean[] = [];
    const original = mounter.unmount.bind(mounter);
    mounter.unmount = (dir: string) => {
      seen.push(fs.existsSync(dir));
      original(dir);
    };

    const mount = ScopedMount.acquire('/dev/sdb1', { mounter });
    mount.release();

    expect(seen).toEqual([true]);
    expect(fs.existsSync(mount.directory)).toBe(false);
    expect(mounter.mounted.has(mount.directory)).toBe(false);
  });

  it('releases exactly once', () => {
    const mount = ScopedMount.acquire('/dev/sdb1', { mounter });
    mount.release();
    mount.release();

    expect(mounter.calls.filter((c) => c.op === 'unmount')).toHaveLength(1);
  });

  it('leaves a disowned mount in place', () => {
    const mount = ScopedMount.acquire('/dev/sdb1', { mounter });
    mount.disown();
    mount.release();

    expect(mount.ownsMount).toBe(false);
    expect(mounter.calls.map((c) => c.op)).toEqual(['mount']);
    expect(fs.existsSync(mount.directory)).toBe(true);
    fs.rmdirSync(mount.directory);
  });

  it('removes the directory when the mount itself fails', () => {
    mounter.failMount = new Error('mount: wrong fs type');

    expect(() => ScopedMount.acquire('/dev/sdb1', { mounter })).toThrow(
      'mount: wrong fs type',
    );
    const call = mounter.calls[0];
    expect(call.op).toBe('mount');
    if (call.op === 'mount') expect(fs.existsSync(call.directory)).toBe(false);
  });

  it('passes the mount request through', () => {
    const mount = ScopedMount.acquire('filer:/export', {
      mounter,
      request: { type: 'nfs', options: ['ro', 'nolock'] },
    });

    expect(mounter.calls[0]).toEqual({
      op: 'mount',
      source: 'filer:/export',
      directory: mount.directory,
      req: { type: 'nfs', options: ['ro', 'nolock'] },
    });
    mount.release();
  });
});

describe('withScopedMount', () => {
  let mounter: FakeMounter;

  beforeEach(() => {
    vi.clearAllMocks();
    mounter = new FakeMounter();
  });

  it('returns the body result and cleans up', async () => {
    let dir = '';
    const result = await withScopedMount('/dev/sdb1', { mounter }, (mount) => {
      dir = mount.directory;
      return 'done';
    });

    expect(result).toBe('done');
    expect(fs.existsSync(dir)).toBe(false);
    expect(mounter.mounted.size).toBe(0);
  });

  it('cleans up after a body that throws mid-use', async () => {
    let dir = '';
    await expect(
      withScopedMount('/dev/sdb1', { mounter }, async (mount) => {
        dir = mount.directory;
        throw new Error('copy failed');
      }),
    ).rejects.toThrow('copy failed');

    expect(mounter.mounted.has(dir)).toBe(false);
    expect(fs.existsSync(dir)).toBe(false);
  });

  it('reports the body error when cleanup also fails', async () => {
    mounter.failUnmount = new Error('umount: target is busy');
    let dir = '';

    await expect(
      withScopedMount('/dev/sdb1', { mounter }, (mount) => {
        dir = mount.directory;
        throw new Error('copy failed');
      }),
    ).rejects.toThrow('copy failed');

    expect(logger.warn).toHaveBeenCalledTimes(1);
    // still mounted, so the directory must survive
    expect(fs.existsSync(dir)).toBe(true);
    fs.rmdirSync(dir);
  });

  it('skips cleanup when the body disowns the mount', async () => {
    let dir = '';
    await withScopedMount('/dev/sdb1', { mounter }, (mount) => {
      dir = mount.directory;
      mount.disown();
    });

    expect(mounter.mounted.get(dir)).toBe('/dev/sdb1');
    expect(fs.existsSync(dir)).toBe(true);
    fs.rmdirSync(dir);
  });
});
