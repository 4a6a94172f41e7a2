/**
 * LocationSpecifier parsing.
 *
 *   http://host/path.swi, https://…, ftp://…
 *   scp://[user[:password]@]host[:port]/path   (ssh:// is an alias)
 *   tftp://host[:port]/path
 *   nfs://host[:port]/export/path.swi
 *   /dev/sdb2:images/foo.swi      device node + path inside it
 *   ONL-IMAGES::latest            label + path (or the :latest token)
 *   /mnt/onl/images/foo.swi       local path
 *
 * IPv6 literals are not supported in host parts: the first ':' after the
 * credentials is taken as the port separator.
 */
import { invalidSpecifier } from './errors.js';
import type { HostInfo, ParsedSpecifier } from './types.js';

const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/(.*)$/;
const LABEL_PATTERN = /^([^/:]+):(.+)$/;

function decode(specifier: string, part: string): string {
  try {
    return decodeURIComponent(part);
  } catch {
    throw invalidSpecifier(specifier, 'bad percent-escape in credentials');
  }
}

interface Authority {
  userinfo: string | null;
  hostport: string;
  path: string | null;
}

// Without a ':' ahead of its first '/', text before an '@' is path, not
// credentials: nfs://filer/export/a@b/foo.swi
function looksLikeUserinfo(candidate: string): boolean {
  const slash = candidate.indexOf('/');
  return slash === -1 || candidate.slice(0, slash).includes(':');
}

/**
 * Splits `[userinfo@]host[:port][/path]`. Userinfo runs to the last '@'
 * ahead of the first '/' that follows an '@', so a password may itself
 * contain '@' or '/'.
 */
function splitAuthority(rest: string): Authority {
  let userinfo: string | null = null;
  let remainder = rest;

  const firstAt = rest.indexOf('@');
  if (firstAt !== -1) {
    const slash = rest.indexOf('/', firstAt);
    const at = rest.lastIndexOf('@', slash === -1 ? rest.length : slash);
    const candidate = rest.slice(0, at);
    if (looksLikeUserinfo(candidate)) {
      userinfo = candidate;
      remainder = rest.slice(at + 1);
    }
  }

  const slash = remainder.indexOf('/');
  if (slash === -1) return { userinfo, hostport: remainder, path: null };
  return {
    userinfo,
    hostport: remainder.slice(0, slash),
    path: remainder.slice(slash),
  };
}

function parseHost(
  specifier: string,
  userinfo: string | null,
  hostport: string,
): HostInfo {
  const info: HostInfo = { host: hostport };

  const colon = hostport.indexOf(':');
  if (colon !== -1) {
    info.host = hostport.slice(0, colon);
    const port = hostport.slice(colon + 1);
    const n = Number(port);
    if (!/^\d+$/.test(port) || n < 1 || n > 65535) {
      throw invalidSpecifier(specifier, `bad port '${port}'`);
    }
    info.port = n;
  }
  if (!info.host) throw invalidSpecifier(specifier, 'missing host');

  if (userinfo !== null) {
    const sep = userinfo.indexOf(':');
    const user = sep === -1 ? userinfo : userinfo.slice(0, sep);
    if (user) info.user = decode(specifier, user);
    if (sep !== -1) {
      info.password = decode(specifier, userinfo.slice(sep + 1));
    }
  }
  return info;
}

function parseRemote(
  specifier: string,
  rest: string,
): { host: HostInfo; path: string } {
  const { userinfo, hostport, path } = splitAuthority(rest);
  if (path === null) throw invalidSpecifier(specifier, 'no path after host');
  if (path === '/') throw invalidSpecifier(specifier, 'empty path');
  return { host: parseHost(specifier, userinfo, hostport), path };
}

export function parseSpecifier(specifier: string): ParsedSpecifier {
  const scheme = specifier.match(SCHEME_PATTERN);
  if (scheme) {
    const name = scheme[1].toLowerCase();
    const rest = scheme[2];
    switch (name) {
      case 'http':
      case 'https':
      case 'ftp':
        return { kind: 'url', scheme: name, url: specifier };
      case 'scp':
      case 'ssh':
        return { kind: 'ssh', ...parseRemote(specifier, rest) };
      case 'tftp':
        return { kind: 'tftp', ...parseRemote(specifier, rest) };
      case 'nfs':
        return { kind: 'nfs', ...parseRemote(specifier, rest) };
      default:
        throw invalidSpecifier(specifier, `unsupported scheme '${name}'`);
    }
  }

  if (specifier.startsWith('/dev/')) {
    const colon = specifier.indexOf(':');
    if (colon !== -1) {
      const path = specifier.slice(colon + 1);
      if (!path) throw invalidSpecifier(specifier, 'no path after device');
      return { kind: 'device', device: specifier.slice(0, colon), path };
    }
  }

  if (specifier.startsWith('/')) {
    return { kind: 'local', path: specifier };
  }

  const label = specifier.match(LABEL_PATTERN);
  if (label) {
    return { kind: 'device', device: label[1], path: label[2] };
  }

  throw invalidSpecifier(specifier, 'unrecognised form');
}

/** Specifier safe for logs: any embedded password is masked. */
export function redactSpecifier(specifier: string): string {
  const scheme = specifier.match(SCHEME_PATTERN);
  if (!scheme) return specifier;

  // Masks through the last '@' that could close userinfo, even where the
  // parser splits earlier; an '@' in the path may be masked with it.
  const rest = scheme[2];
  const at = rest.lastIndexOf('@');
  if (at === -1) return specifier;
  const userinfo = rest.slice(0, at);
  const sep = userinfo.indexOf(':');
  if (!looksLikeUserinfo(userinfo) || sep === -1) return specifier;
  return `${scheme[1]}://${userinfo.slice(0, sep)}:***@${rest.slice(at + 1)}`;
}
