export type SwiErrorKind =
  | 'InvalidSpecifier'
  | 'NotFound'
  | 'TransportFailure'
  | 'MissingArchive';

/**
 * Raised by any stage of resolution. The dispatcher turns it into a
 * failed outcome; nothing below the dispatcher catches it.
 */
export class SwiResolveError extends Error {
  constructor(
    public readonly kind: SwiErrorKind,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'SwiResolveError';
  }
}

export function invalidSpecifier(
  specifier: string,
  reason: string,
): SwiResolveError {
  return new SwiResolveError(
    'InvalidSpecifier',
    `invalid specifier: ${reason}`,
    { specifier },
  );
}
