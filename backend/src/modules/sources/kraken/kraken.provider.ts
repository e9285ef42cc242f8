/**
 * Kraken Spot Provider
 * Source: Kraken public REST API (no key required)
 *
 * Endpoints:
 * - /0/public/Ticker  → last trade price
 * - /0/public/Depth   → order book, reduced to wall strength
 */

import type { AxiosInstance } from 'axios';
import type { FetchOptions, OrderBookWallPayload, PricePayload } from '../../signal/contracts/source.types.js';
import { getJson } from '../source.utils.js';
import { computeWallStrength, KRAKEN_PAIR, parseDepth, parseTicker } from './kraken.parsers.js';

export const KRAKEN_BASE_URL = 'https://api.kraken.com';
export const DEFAULT_WALL_BAND_PCT = 0.01;
const DEPTH_COUNT = 100;

export type KrakenProviderOptions = {
  http: AxiosInstance;
  wallBandPct?: number;
};

export class KrakenProvider {
  private readonly http: AxiosInstance;
  private readonly wallBandPct: number;

  constructor(options: KrakenProviderOptions) {
    this.http = options.http;
    this.wallBandPct = options.wallBandPct ?? DEFAULT_WALL_BAND_PCT;
  }

  async fetchPrice(options: FetchOptions): Promise<PricePayload> {
    const data = await getJson(this.http, 'KRAKEN', 'price', '/0/public/Ticker', { pair: KRAKEN_PAIR }, options);
    return parseTicker(data);
  }

  async fetchOrderBook(options: FetchOptions): Promise<OrderBookWallPayload> {
    const data = await getJson(
      this.http,
      'KRAKEN',
      'orderBook',
      '/0/public/Depth',
      { pair: KRAKEN_PAIR, count: DEPTH_COUNT },
      options
    );
    const { bids, asks } = parseDepth(data);
    return computeWallStrength(bids, asks, this.wallBandPct);
  }
}
