#!/usr/bin/env node
/**
 * swi-locate: resolve a SWI location specifier to a local path.
 *
 * Usage: swi-locate <specifier>
 *
 * Prints the path on stdout and exits 0, or logs to stderr and exits 1.
 */
import fs from 'fs';
import { pathToFileURL } from 'url';

import { SwiResolver } from './swi-resolver.js';

const USAGE = `Usage: swi-locate <specifier>

Specifiers:
  http://host/path.swi  https://…  ftp://…
  scp://[user[:password]@]host[:port]/path.swi
  tftp://host[:port]/path.swi
  nfs://host[:port]/export/path.swi
  /dev/sdb2:path.swi    LABEL:path.swi    LABEL::latest
  /local/path.swi
`;

export interface CliIo {
  stdout: { write(chunk: string): boolean };
  stderr: { write(chunk: string): boolean };
}

export async function main(
  argv: string[],
  io: CliIo = process,
  resolver: SwiResolver = new SwiResolver(),
): Promise<number> {
  if (argv.includes('--help') || argv.includes('-h')) {
    io.stderr.write(USAGE);
    return 0;
  }
  if (argv.length !== 1) {
    io.stderr.write(USAGE);
    return 1;
  }

  const outcome = await resolver.resolve(argv[0]);
  if (outcome.status === 'failed') return 1;

  io.stdout.write(`${outcome.path}\n`);
  return 0;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    // npm installs the bin as a symlink
    return import.meta.url === pathToFileURL(fs.realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
