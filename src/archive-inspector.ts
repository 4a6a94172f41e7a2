/**
 * Archive Inspector: works out when a SWI was built.
 *
 * Sources are tried most-trusted first and the first one that yields a
 * timestamp wins. A file that is not a zip at all skips straight to its
 * modification time.
 */
import AdmZip from 'adm-zip';
import fs from 'fs';

import { logger } from './logger.js';
import type { ArchiveVersion, VersionSource } from './types.js';
import {
  extractVersionKey,
  parseBuildTimestamp,
  parseFilenameTimestamp,
} from './version-key.js';

export const MANIFEST_ENTRY = 'manifest.json';
export const VERSION_ENTRY = 'version';

export interface VersionStrategy {
  readonly source: Exclude<VersionSource, 'mtime'>;
  extract(zip: AdmZip, archivePath: string): Date | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readEntry(
  zip: AdmZip,
  archivePath: string,
  name: string,
): string | null {
  const entry = zip.getEntry(name);
  if (!entry || entry.isDirectory) return null;
  try {
    return zip.readAsText(entry, 'utf8');
  } catch (err) {
    logger.debug({ archivePath, entry: name, err }, 'Unreadable zip entry');
    return null;
  }
}

const manifestStrategy: VersionStrategy = {
  source: 'manifest',
  extract(zip, archivePath) {
    const raw = readEntry(zip, archivePath, MANIFEST_ENTRY);
    if (raw === null) return null;

    let manifest: unknown;
    try {
      manifest = JSON.parse(raw);
    } catch (err) {
      logger.debug({ archivePath, err }, 'Unparsable manifest.json');
      return null;
    }
    if (!isRecord(manifest) || !isRecord(manifest.version)) return null;

    const { BUILD_TIMESTAMP, FNAME_BUILD_TIMESTAMP } = manifest.version;
    if (typeof BUILD_TIMESTAMP === 'string') {
      const key = parseBuildTimestamp(BUILD_TIMESTAMP);
      if (key) return key;
    }
    if (typeof FNAME_BUILD_TIMESTAMP === 'string') {
      return parseFilenameTimestamp(FNAME_BUILD_TIMESTAMP);
    }
    return null;
  },
};

const versionFileStrategy: VersionStrategy = {
  source: 'version-file',
  extract(zip, archivePath) {
    const raw = readEntry(zip, archivePath, VERSION_ENTRY);
    return raw === null ? null : extractVersionKey(raw);
  },
};

const filenameStrategy: VersionStrategy = {
  source: 'filename',
  extract(_zip, archivePath) {
    return extractVersionKey(archivePath);
  },
};

/** Ordered most to least trusted. The order is part of the contract. */
export const ARCHIVE_VERSION_STRATEGIES: readonly VersionStrategy[] = [
  manifestStrategy,
  versionFileStrategy,
  filenameStrategy,
];

function openZip(archivePath: string): AdmZip | null {
  try {
    return new AdmZip(archivePath);
  } catch (err) {
    logger.debug({ archivePath, err }, 'Not a zip archive, using mtime');
    return null;
  }
}

/**
 * Returns null only when the archive vanished or cannot be stat'ed; every
 * other failure falls through to the next, less trusted source.
 */
export function inspectArchive(archivePath: string): ArchiveVersion | null {
  const zip = openZip(archivePath);
  if (zip) {
    for (const strategy of ARCHIVE_VERSION_STRATEGIES) {
      const key = strategy.extract(zip, archivePath);
      if (key) return { path: archivePath, key, source: strategy.source };
    }
  }
  try {
    const { mtime } = fs.statSync(archivePath);
    return { path: archivePath, key: mtime, source: 'mtime' };
  } catch (err) {
    logger.debug({ archivePath, err }, 'Cannot stat archive');
    return null;
  }
}
