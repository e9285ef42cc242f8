/**
 * Polymarket Provider
 * Source: Polymarket gamma API (public, no key required)
 *
 * Endpoint: https://gamma-api.polymarket.com/markets
 * Picks the most relevant open BTC market as odds context for the verdict.
 */

import type { AxiosInstance } from 'axios';
import type { FetchOptions, PolymarketPayload } from '../../signal/contracts/source.types.js';
import { getJson } from '../source.utils.js';
import { parseMarkets } from './polymarket.parsers.js';

export const GAMMA_BASE_URL = 'https://gamma-api.polymarket.com';

export type PolymarketProviderOptions = {
  http: AxiosInstance;
  now?: () => number;
};

export class PolymarketProvider {
  private readonly http: AxiosInstance;
  private readonly now: () => number;

  constructor(options: PolymarketProviderOptions) {
    this.http = options.http;
    this.now = options.now ?? Date.now;
  }

  async fetchMarket(options: FetchOptions): Promise<PolymarketPayload> {
    const data = await getJson(
      this.http,
      'POLYMARKET',
      'polymarket',
      '/markets',
      {
        limit: 100,
        active: 'true',
        closed: 'false',
        tag_slug: 'bitcoin',
        order: 'volume24hr',
        ascending: 'false',
      },
      options
    );
    return parseMarkets(data, this.now());
  }
}
