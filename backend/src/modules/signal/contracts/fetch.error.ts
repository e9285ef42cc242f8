/**
 * Typed failure of a single source fetch.
 */

import type { SourceName } from './source.types.js';

export type FetchErrorKind = 'TIMEOUT' | 'TRANSPORT' | 'MALFORMED' | 'UPSTREAM';

export class FetchError extends Error {
  constructor(
    public readonly kind: FetchErrorKind,
    public readonly source: SourceName,
    message: string
  ) {
    super(message);
    this.name = 'FetchError';
  }
}
