/**
 * Shared plumbing for the upstream providers: paced GET, zod parsing with
 * MALFORMED failures, numeric coercion of string-encoded exchange fields.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { schedule, type Provider } from '../network/rateLimiter.js';
import { toFetchError } from '../network/http.errors.js';
import { FetchError } from '../signal/contracts/fetch.error.js';
import type { FetchOptions, SourceName } from '../signal/contracts/source.types.js';

/** Exchange APIs send most numbers as strings. */
export const numeric = z
  .union([z.string().min(1), z.number()])
  .transform((v) => Number(v))
  .pipe(z.number().finite());

export type QueryParams = Record<string, string | number | boolean>;

/**
 * One paced GET. Any failure surfaces as a FetchError for `source`.
 */
export async function getJson(
  http: AxiosInstance,
  provider: Provider,
  source: SourceName,
  url: string,
  params: QueryParams,
  options: FetchOptions
): Promise<unknown> {
  try {
    const response = await schedule(provider, () =>
      http.get<unknown>(url, { params, signal: options.signal, timeout: options.timeoutMs })
    );
    return response.data;
  } catch (err) {
    throw toFetchError(source, err);
  }
}

export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown, source: SourceName): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid payload';
    throw new FetchError('MALFORMED', source, `Unexpected ${source} payload (${detail})`);
  }
  return result.data;
}
