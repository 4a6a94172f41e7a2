import fs from 'fs';
import path from 'path';

import { inspectArchive } from './archive-inspector.js';
import { SWI_SUFFIX } from './config.js';
import { logger } from './logger.js';
import type { ArchiveVersion } from './types.js';

// Dangling symlinks and entries removed since the listing are skipped.
function isRegularFile(candidatePath: string): boolean {
  try {
    return fs.statSync(candidatePath).isFile();
  } catch (err) {
    logger.debug({ candidatePath, err }, 'Skipping unreadable entry');
    return false;
  }
}

/**
 * Pick the most recently built SWI in `dir`.
 *
 * Filesystem times only count when no archive carries an embedded or
 * filename timestamp. Equal keys resolve to whichever came last in
 * directory-listing order.
 */
export function selectLatestArchive(dir: string): string | null {
  const candidates: ArchiveVersion[] = [];
  for (const name of fs.readdirSync(dir)) {
    if (!name.endsWith(SWI_SUFFIX)) continue;
    const candidatePath = path.join(dir, name);
    if (!isRegularFile(candidatePath)) continue;
    const candidate = inspectArchive(candidatePath);
    if (candidate) candidates.push(candidate);
  }

  const known = candidates.filter((c) => c.source !== 'mtime');
  const ranked = (known.length > 0 ? known : candidates)
    .slice()
    .sort((a, b) => a.key.getTime() - b.key.getTime());

  const latest = ranked.at(-1);
  if (!latest) return null;

  logger.debug(
    {
      dir,
      candidates: ranked.map(
        (c) => `${path.basename(c.path)} ${c.key.toISOString()} (${c.source})`,
      ),
    },
    'Ranked SWI candidates',
  );
  return latest.path;
}
