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

import { SwiResolveError } from '../errors.js';
import { FakeCommandRunner } from '../test-fakes.js';
import { shellQuote, SshResolver } from './ssh-resolver.js';

describe('SshResolver', () => {
  const results: string[] = [];

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    for (const r of results.splice(0)) {
      fs.rmSync(path.dirname(r), { recursive: true, force: true });
    }
  });

  it('passes the password through the environment only', async () => {
    const runner = new FakeCommandRunner();
    const result = await new SshResolver(runner).resolve({
      kind: 'ssh',
      host: {
        host: '10.0.0.5',
        port: 2222,
        user: 'root',
        password: 'test-secret',
      },
      path: '/srv/foo.swi',
    });
    results.push(result);

    expect(path.basename(result)).toBe('foo.swi');
    expect(runner.calls).toEqual([
      {
        bin: 'sshpass',
        args: [
          '-e',
          'ssh',
          '-o',
          'StrictHostKeyChecking=no',
          '-o',
          'UserKnownHostsFile=/dev/null',
          '-p',
          '2222',
          'root@10.0.0.5',
          "cat '/srv/foo.swi'",
        ],
        opts: { env: { SSHPASS: 'test-secret' }, stdoutFile: result },
      },
    ]);
    expect(runner.calls[0].args.join(' ')).not.toContain('test-secret');
  });

  it('runs plain ssh in batch mode without a password', async () => {
    const runner = new FakeCommandRunner();
    const result = await new SshResolver(runner).resolve({
      kind: 'ssh',
      host: { host: 'builder' },
      path: '/images/foo.swi',
    });
    results.push(result);

    expect(runner.calls[0].bin).toBe('ssh');
    expect(runner.calls[0].args.slice(-3)).toEqual([
      'BatchMode=yes',
      'builder',
      "cat '/images/foo.swi'",
    ]);
    expect(runner.calls[0].opts).toEqual({ stdoutFile: result });
  });

  it('removes the temp file when the copy fails', async () => {
    const runner = new FakeCommandRunner((cmd) => {
      if (cmd.opts.stdoutFile) fs.writeFileSync(cmd.opts.stdoutFile, '');
      throw new SwiResolveError(
        'TransportFailure',
        'ssh exited with status 255',
      );
    });

    await expect(
      new SshResolver(runner).resolve({
        kind: 'ssh',
        host: { host: 'h' },
        path: '/foo.swi',
      }),
    ).rejects.toThrow('ssh exited with status 255');
    const target = runner.calls[0].opts.stdoutFile ?? '';
    expect(fs.existsSync(path.dirname(target))).toBe(false);
  });
});

describe('shellQuote', () => {
  it('quotes embedded single quotes', () => {
    expect(shellQuote("it's.swi")).toBe("'it'\\''s.swi'");
  });
});
