/**
 * Maps whatever a source fetch threw onto a typed FetchError.
 */

import axios from 'axios';
import { FetchError } from '../signal/contracts/fetch.error.js';
import type { SourceName } from '../signal/contracts/source.types.js';
import { errorMessage } from '../../common/logger.js';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);

export function toFetchError(source: SourceName, err: unknown): FetchError {
  if (err instanceof FetchError) return err;

  if (axios.isAxiosError(err)) {
    if (err.code && TIMEOUT_CODES.has(err.code)) {
      return new FetchError('TIMEOUT', source, err.message || 'request timed out');
    }
    if (err.response) {
      return new FetchError('UPSTREAM', source, `HTTP ${err.response.status} from ${source}`);
    }
    return new FetchError('TRANSPORT', source, err.message || 'network error');
  }

  return new FetchError('TRANSPORT', source, errorMessage(err));
}
