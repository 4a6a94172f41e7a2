/**
 * UrlResolver: http, https and ftp.
 *
 * http(s) streams through fetch with our own progress line; ftp goes
 * through curl, which draws its progress bar when stderr is a terminal.
 */
import fs from 'fs';
import path from 'path';

import { DownloadProgress, type ProgressStream } from '../download-progress.js';
import { invalidSpecifier, SwiResolveError } from '../errors.js';
import type { ICommandRunner } from '../interfaces/command-runner.js';
import { logger } from '../logger.js';
import { redactSpecifier } from '../specifier.js';
import { TempPaths } from '../temp-paths.js';
import type { SpecifierOf } from '../types.js';
import { discardDownload } from './cleanup.js';
import type { TransportResolver } from './types.js';

export type FetchFn = typeof fetch;

export class UrlResolver implements TransportResolver<'url'> {
  readonly kind = 'url';

  constructor(
    private readonly runner: ICommandRunner,
    private readonly fetchImpl: FetchFn = fetch,
    private readonly progressOut: ProgressStream = process.stderr,
  ) {}

  async resolve(spec: SpecifierOf<'url'>): Promise<string> {
    let name: string;
    try {
      name = path.posix.basename(new URL(spec.url).pathname);
    } catch {
      throw invalidSpecifier(spec.url, 'malformed URL');
    }
    const target = TempPaths.downloadFile(name);
    try {
      if (spec.scheme === 'ftp') {
        this.fetchWithCurl(spec.url, target);
      } else {
        await this.download(spec.url, target);
      }
    } catch (err) {
      discardDownload(target);
      throw err;
    }
    logger.info({ url: redactSpecifier(spec.url), target }, 'Downloaded SWI');
    return target;
  }

  private fetchWithCurl(url: string, target: string): void {
    if (this.progressOut.isTTY) {
      this.runner.run(
        'curl',
        ['--progress-bar', '-S', '-f', '-o', target, url],
        { inheritStderr: true },
      );
    } else {
      this.runner.run('curl', ['-sS', '-f', '-o', target, url]);
    }
  }

  private async download(url: string, target: string): Promise<void> {
    const shown = redactSpecifier(url);
    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SwiResolveError(
        'TransportFailure',
        `download failed: ${reason}`,
        { url: shown },
      );
    }
    if (!response.ok) {
      throw new SwiResolveError(
        'TransportFailure',
        `download failed: ${response.status} ${response.statusText}`,
        { url: shown, status: response.status },
      );
    }

    const contentLength = response.headers.get('content-length');
    const total = contentLength ? parseInt(contentLength, 10) : null;
    const progress = new DownloadProgress(
      path.basename(target),
      total,
      this.progressOut,
    );

    const fd = fs.openSync(target, 'w');
    try {
      if (response.body) {
        const reader = response.body.getReader();
        while (true) {
          const { done, value } = await reader.read();
          if (done) break;
          fs.writeSync(fd, value);
          progress.update(value.byteLength);
        }
      }
    } finally {
      fs.closeSync(fd);
    }
    progress.finish();
  }
}
