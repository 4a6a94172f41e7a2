/**
 * Build timestamps embedded in manifests, version markers and filenames.
 *
 * Two shapes are recognised:
 *   YYYY-MM-DD.HH:MM  (manifests, legacy version files)
 *   YYYY-MM-DD.HHMM   (filenames, where ':' is awkward)
 *
 * All values are interpreted as UTC. Anything that fails to parse is null.
 */

const COLON_PATTERN = /(\d{4})-(\d{2})-(\d{2})\.(\d{2}):(\d{2})/;
const COMPACT_PATTERN = /(\d{4})-(\d{2})-(\d{2})\.(\d{2})(\d{2})/;

function anchored(pattern: RegExp): RegExp {
  return new RegExp(`^${pattern.source}$`);
}

const COLON_EXACT = anchored(COLON_PATTERN);
const COMPACT_EXACT = anchored(COMPACT_PATTERN);

function toDate(match: RegExpMatchArray): Date | null {
  const [year, month, day, hour, minute] = match
    .slice(1, 6)
    .map((d) => parseInt(d, 10));
  if (month < 1 || month > 12 || hour > 23 || minute > 59) return null;

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute));
  // Date.UTC rolls Feb 30 over into March; reject instead
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) {
    return null;
  }
  return date;
}

/**
 * Find the first build timestamp anywhere in `text`. The colon form is
 * tried before the compact form; only the first match of a form is
 * considered.
 */
export function extractVersionKey(text: string): Date | null {
  const colon = text.match(COLON_PATTERN);
  if (colon) return toDate(colon);

  const compact = text.match(COMPACT_PATTERN);
  if (compact) return toDate(compact);

  return null;
}

/** Parse a whole `%Y-%m-%d.%H:%M` value, e.g. a manifest BUILD_TIMESTAMP. */
export function parseBuildTimestamp(value: string): Date | null {
  const match = value.trim().match(COLON_EXACT);
  return match ? toDate(match) : null;
}

/** Parse a whole `%Y-%m-%d.%H%M` value, e.g. FNAME_BUILD_TIMESTAMP. */
export function parseFilenameTimestamp(value: string): Date | null {
  const match = value.trim().match(COMPACT_EXACT);
  return match ? toDate(match) : null;
}
