/**
 * SwiResolver: top-level entry point. Parses a location specifier,
 * hands it to the resolver for its scheme and reports the outcome.
 */
import type { ProgressStream } from './download-progress.js';
import { SwiResolveError } from './errors.js';
import {
  BlkidPartitionLocator,
  type ICommandRunner,
  type ILiveMountTable,
  type IMounter,
  type IMountRegistry,
  type IPartitionLocator,
  ProcessCommandRunner,
  ProcMountTable,
  SystemMounter,
  YamlMountRegistry,
} from './interfaces/index.js';
import { logger } from './logger.js';
import { BlockdevResolver } from './resolvers/blockdev-resolver.js';
import { LocalResolver } from './resolvers/local-resolver.js';
import { NfsResolver } from './resolvers/nfs-resolver.js';
import { SshResolver } from './resolvers/ssh-resolver.js';
import { TftpResolver } from './resolvers/tftp-resolver.js';
import type { ResolverTable } from './resolvers/types.js';
import { type FetchFn, UrlResolver } from './resolvers/url-resolver.js';
import { parseSpecifier, redactSpecifier } from './specifier.js';
import type { ParsedSpecifier } from './types.js';

export type ResolveOutcome =
  | { status: 'resolved'; path: string }
  | { status: 'failed'; error: SwiResolveError };

export interface SwiResolverDeps {
  runner?: ICommandRunner;
  mounter?: IMounter;
  registry?: IMountRegistry;
  liveMounts?: ILiveMountTable;
  partitions?: IPartitionLocator;
  fetch?: FetchFn;
  progressOut?: ProgressStream;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled specifier: ${JSON.stringify(value)}`);
}

function toResolveError(err: unknown): SwiResolveError {
  if (err instanceof SwiResolveError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new SwiResolveError('TransportFailure', message);
}

export class SwiResolver {
  private readonly resolvers: ResolverTable;

  constructor(deps?: SwiResolverDeps) {
    const runner = deps?.runner ?? new ProcessCommandRunner();
    const mounter = deps?.mounter ?? new SystemMounter(runner);
    const registry = deps?.registry ?? new YamlMountRegistry();

    const device = new BlockdevResolver({
      mounter,
      registry,
      liveMounts: deps?.liveMounts ?? new ProcMountTable(),
      partitions: deps?.partitions ?? new BlkidPartitionLocator(runner),
    });

    this.resolvers = {
      url: new UrlResolver(runner, deps?.fetch, deps?.progressOut),
      ssh: new SshResolver(runner),
      tftp: new TftpResolver(runner),
      nfs: new NfsResolver(mounter),
      device,
      local: new LocalResolver(registry, device),
    };
  }

  async resolve(specifier: string): Promise<ResolveOutcome> {
    try {
      const spec = parseSpecifier(specifier);
      const path = await this.route(spec);
      logger.info(
        { specifier: redactSpecifier(specifier), path },
        'Resolved SWI',
      );
      return { status: 'resolved', path };
    } catch (err) {
      const error = toResolveError(err);
      logger.error(
        {
          ...error.details,
          specifier: redactSpecifier(specifier),
          kind: error.kind,
        },
        error.message,
      );
      return { status: 'failed', error };
    }
  }

  private route(spec: ParsedSpecifier): Promise<string> {
    switch (spec.kind) {
      case 'url':
        return this.resolvers.url.resolve(spec);
      case 'ssh':
        return this.resolvers.ssh.resolve(spec);
      case 'tftp':
        return this.resolvers.tftp.resolve(spec);
      case 'nfs':
        return this.resolvers.nfs.resolve(spec);
      case 'device':
        return this.resolvers.device.resolve(spec);
      case 'local':
        return this.resolvers.local.resolve(spec);
      default:
        return assertNever(spec);
    }
  }
}
