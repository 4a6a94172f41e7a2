import type { SpecifierKind, SpecifierOf } from '../types.js';

/** One addressing scheme. Yields a local path or throws SwiResolveError. */
export interface TransportResolver<K extends SpecifierKind> {
  readonly kind: K;
  resolve(spec: SpecifierOf<K>): Promise<string>;
}

export type ResolverTable = { [K in SpecifierKind]: TransportResolver<K> };
