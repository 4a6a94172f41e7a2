/** Parsed connection endpoint of a remote specifier. */
export interface HostInfo {
  host: string;
  port?: number;
  user?: string;
  password?: string;
}

export interface MountRecord {
  label: string;
  directory: string;
}

export interface LiveMount {
  device: string;
  directory: string;
}

export interface Partition {
  label: string;
  device: string;
}

export type UrlScheme = 'http' | 'https' | 'ftp';

export type ParsedSpecifier =
  | { kind: 'url'; scheme: UrlScheme; url: string }
  | { kind: 'ssh'; host: HostInfo; path: string }
  | { kind: 'tftp'; host: HostInfo; path: string }
  | { kind: 'nfs'; host: HostInfo; path: string }
  // `device` is either a /dev node or a partition/mount label
  | { kind: 'device'; device: string; path: string }
  | { kind: 'local'; path: string };

export type SpecifierKind = ParsedSpecifier['kind'];

export type SpecifierOf<K extends SpecifierKind> = Extract<
  ParsedSpecifier,
  { kind: K }
>;

export type VersionSource = 'manifest' | 'version-file' | 'filename' | 'mtime';

export interface ArchiveVersion {
  path: string;
  key: Date;
  source: VersionSource;
}
